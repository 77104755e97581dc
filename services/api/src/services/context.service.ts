import { RetrievedDocument } from '../types/pipeline.types';

export const CONTEXT_SEPARATOR = '\n\n';

/**
 * Join documents into the context block handed to the model, in the order given.
 */
export function assembleContext(documents: readonly RetrievedDocument[]): string {
  return documents
    .map((doc) => `Title: ${doc.title}\nContent: ${doc.content}`)
    .join(CONTEXT_SEPARATOR);
}

export type ContextAssembler = (documents: readonly RetrievedDocument[]) => string;
