/**
 * バリデーション関数
 * 純粋関数でEither<DomainError, T>を返す
 */
import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import type { DomainError } from './errors.js';
import { validationError } from './errors.js';

/** 自然言語リクエストの上限長 */
export const MAX_REQUEST_LENGTH = 2000;

// 文字列バリデーション
export const validateString = (
  field: string,
  value: unknown,
  maxLength: number
): E.Either<DomainError, string> => {
  if (typeof value !== 'string') {
    return E.left(validationError(`${field} must be a string`));
  }
  if (value.trim().length === 0) {
    return E.left(validationError(`${field} cannot be empty`));
  }
  if (value.length > maxLength) {
    return E.left(validationError(`${field} exceeds maximum length of ${maxLength}`));
  }
  return E.right(value);
};

/**
 * リクエストの検証（オラクル呼び出し前）
 * 前後の空白は除去して返す
 */
export const validateRequest = (request: unknown): E.Either<DomainError, string> =>
  pipe(
    validateString('request', request, MAX_REQUEST_LENGTH),
    E.map((s) => s.trim())
  );

// principal ID バリデーション
export const validatePrincipalId = (value: unknown): E.Either<DomainError, number> => {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isSafeInteger(n) || n <= 0) {
    return E.left(validationError('user id must be a positive integer'));
  }
  return E.right(n);
};
