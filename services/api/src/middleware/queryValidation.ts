import { ValidationResult, ValidationError, ValidationUtils } from './validation';
import { QueryRequest } from '../types/query.types';

export const MAX_QUERY_LENGTH = 2000;
export const MAX_QUERY_LIMIT = 20;

export type ParsedQueryRequest =
  | { success: true; request: QueryRequest }
  | { success: false; errors: ValidationError[] };

/**
 * Query-specific validation functions
 */
export class QueryValidators {
  /**
   * Validate query request structure
   */
  static validateQueryRequest(body: unknown): ValidationResult {
    const errors: ValidationError[] = [];

    if (!ValidationUtils.isPlainObject(body)) {
      errors.push({
        field: 'body',
        message: 'Request body must be a JSON object',
        value: body
      });
      return { isValid: false, errors };
    }

    const { query, limit } = body;

    // Validate query field
    if (query === undefined || query === null) {
      errors.push({
        field: 'query',
        message: 'query field is required',
        value: query
      });
    } else {
      const queryError = ValidationUtils.validateStringLength(query, 1, MAX_QUERY_LENGTH, 'query');
      if (queryError) {
        errors.push(queryError);
      } else if (typeof query === 'string' && query.trim().length === 0) {
        errors.push({
          field: 'query',
          message: 'query must not be blank',
          value: query
        });
      }
    }

    // Validate limit if present
    if (limit !== undefined) {
      const limitError = ValidationUtils.validateIntegerRange(limit, 1, MAX_QUERY_LIMIT, 'limit');
      if (limitError) errors.push(limitError);
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  /**
   * Validate once and hand back the typed request, or the errors to report
   */
  static parseQueryRequest(body: unknown): ParsedQueryRequest {
    const result = QueryValidators.validateQueryRequest(body);
    if (!result.isValid || !ValidationUtils.isPlainObject(body) || typeof body.query !== 'string') {
      return { success: false, errors: result.errors };
    }

    const request: QueryRequest = { query: body.query };
    if (typeof body.limit === 'number') {
      request.limit = body.limit;
    }
    return { success: true, request };
  }
}
