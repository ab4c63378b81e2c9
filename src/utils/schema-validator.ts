import Ajv, { ValidateFunction, ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import reportSchema from '../schemas/report.v1.schema.json';
import { logger } from './logger';
import { ReportV1 } from '../types/report.v1';

// Type for validation errors
export interface ValidationError {
  path: string;
  message: string;
}

export class SchemaValidationError extends Error {
  public readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'SchemaValidationError';
    this.errors = errors;
  }
}

// Unknown properties are stripped where the schema closes an object
const ajv = new Ajv({
  allErrors: true,
  removeAdditional: true,
});

// 'date-time', 'uuid', etc.
addFormats(ajv);

// Compile validators once at startup
const validateReport: ValidateFunction<ReportV1> = ajv.compile<ReportV1>(reportSchema);

/**
 * Validate a report message against its schema
 * @param data The data to validate
 * @returns The validated report
 * @throws SchemaValidationError with validation details if validation fails
 */
export function validateReportMessage(data: unknown): ReportV1 {
  if (!validateReport(data)) {
    const errors = formatValidationErrors(validateReport.errors || []);

    logger.warn({
      schema: 'report.v1',
      errors,
    }, 'Schema validation failed');

    throw new SchemaValidationError('Invalid report message', errors);
  }

  return data;
}

/**
 * Format AJV errors into a more readable structure
 */
function formatValidationErrors(errors: ErrorObject[]): ValidationError[] {
  return errors.map(error => ({
    path: error.instancePath || '/',
    message: error.message || 'Unknown validation error',
  }));
}
