import { QueryStatus } from './pipeline.types';

export interface QueryRequest {
  query: string;
  limit?: number;
}

export interface QueryResponse {
  query: string;
  answer: string;
  status: QueryStatus;
  context: ContextDocument[];
  matches: number;
}

export interface ContextDocument {
  title: string;
  content: string;
  url?: string;
  similarity?: number;
}
