import { Request, Response, NextFunction } from 'express';

/**
 * Validation error interface
 */
export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * Validation result interface
 */
export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

export const MAX_BODY_BYTES = 1024 * 1024; // 1MB

/**
 * Common validation functions
 */
export class ValidationUtils {
  /**
   * Check if the media type is application/json, ignoring case and parameters
   */
  static isJsonContentType(contentType: string): boolean {
    const mediaType = contentType.split(';')[0].trim().toLowerCase();
    return mediaType === 'application/json';
  }

  /**
   * Check if charset is UTF-8
   */
  static isUtf8Charset(contentType: string): boolean {
    const lowered = contentType.toLowerCase();
    return !lowered.includes('charset=') || // Default to UTF-8 if no charset specified
           lowered.includes('charset=utf-8');
  }

  /**
   * Validate string length
   */
  static validateStringLength(value: unknown, min: number, max: number, fieldName: string): ValidationError | null {
    if (typeof value !== 'string') {
      return { field: fieldName, message: `${fieldName} must be a string`, value };
    }
    if (value.length < min) {
      return { field: fieldName, message: `${fieldName} must be at least ${min} characters long`, value };
    }
    if (value.length > max) {
      return { field: fieldName, message: `${fieldName} must be no more than ${max} characters long`, value };
    }
    return null;
  }

  /**
   * Validate integer range
   */
  static validateIntegerRange(value: unknown, min: number, max: number, fieldName: string): ValidationError | null {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      return { field: fieldName, message: `${fieldName} must be an integer`, value };
    }
    if (value < min) {
      return { field: fieldName, message: `${fieldName} must be at least ${min}`, value };
    }
    if (value > max) {
      return { field: fieldName, message: `${fieldName} must be no more than ${max}`, value };
    }
    return null;
  }

  static isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}

/**
 * Send validation error response
 */
export const sendValidationError = (res: Response, errors: ValidationError[], statusCode: number = 400): void => {
  res.status(statusCode).json({
    error: 'Validation failed',
    message: 'Request validation failed',
    details: errors
  });
};

/**
 * Common validation middleware for all endpoints
 */
export const commonValidationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const errors: ValidationError[] = [];

  // Check content type for POST/PUT/PATCH requests
  if (['POST', 'PUT', 'PATCH'].includes(req.method)) {
    const contentType = req.get('Content-Type') || '';

    if (!ValidationUtils.isJsonContentType(contentType)) {
      errors.push({
        field: 'Content-Type',
        message: 'Content-Type must be application/json',
        value: contentType
      });
    }

    if (!ValidationUtils.isUtf8Charset(contentType)) {
      errors.push({
        field: 'Content-Type',
        message: 'Charset must be UTF-8',
        value: contentType
      });
    }
  }

  const contentLength = parseInt(req.get('Content-Length') || '0', 10);

  if (contentLength > MAX_BODY_BYTES) {
    errors.push({
      field: 'Content-Length',
      message: `Request body must be no larger than ${MAX_BODY_BYTES} bytes (1MB)`,
      value: contentLength
    });
  }

  if (errors.length > 0) {
    sendValidationError(res, errors);
    return;
  }

  next();
};
