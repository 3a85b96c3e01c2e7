import { z } from 'zod';
import {
  EXHIBITS_OPTIONS_SCHEMA,
  EXTRACT_OPTIONS_SCHEMA,
  VALIDATE_OPTIONS_SCHEMA,
  type ExhibitsOptions,
  type ExtractOptions,
  type ValidateOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown, command: string): z.infer<T> {
  try {
    return schema.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const details = e.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ValidationError(`Invalid ${command} options: ${details}`, e);
    }
    const err = handleUnknownError(e, `${command} option parsing`);
    throw new ValidationError(`${command} option parsing failed: ${err.message}`, e);
  }
}

export function parseExtractOptions(raw: unknown): ExtractOptions {
  return parseOptions(EXTRACT_OPTIONS_SCHEMA, raw, 'extract');
}

export function parseExhibitsOptions(raw: unknown): ExhibitsOptions {
  return parseOptions(EXHIBITS_OPTIONS_SCHEMA, raw, 'exhibits');
}

export function parseValidateOptions(raw: unknown): ValidateOptions {
  return parseOptions(VALIDATE_OPTIONS_SCHEMA, raw, 'validate');
}
