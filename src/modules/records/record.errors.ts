/**
 * src/modules/records/record.errors.ts
 *
 * WHY:
 * - Records module owns its validation and lookup error semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Validation errors send the client back to the entry form (home).
 * - Never include password values in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

const FORM_PATH = '/';

export const RecordErrors = {
  cardIdRequired(meta?: AppErrorMeta) {
    return AppError.validationError('card id required', meta).withRedirect(FORM_PATH);
  },

  unitRequired(meta?: AppErrorMeta) {
    return AppError.validationError('unit required', meta).withRedirect(FORM_PATH);
  },

  invalidUnit(meta?: AppErrorMeta) {
    return AppError.validationError('invalid unit', meta).withRedirect(FORM_PATH);
  },

  passwordsRequired(meta?: AppErrorMeta) {
    return AppError.validationError('at least one password required', meta).withRedirect(
      FORM_PATH,
    );
  },

  tooManyPasswords(meta?: AppErrorMeta) {
    return AppError.validationError('maximum five passwords', meta).withRedirect(FORM_PATH);
  },

  invalidInput(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid request body', meta).withRedirect(FORM_PATH);
  },

  /** Missing, or outside the caller's units. Both look the same to the client. */
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('Record not found.', meta).withRedirect('/records');
  },
} as const;
