/**
 * コマンドライン引数の解釈
 *
 * Usage:
 *   rowguard [--db <path>] [--user <id>]
 *   rowguard seed <file.json> [--db <path>]
 */
import * as E from 'fp-ts/Either';
import type { DomainError } from '../domain/errors.js';
import { validationError } from '../domain/errors.js';
import { validatePrincipalId } from '../domain/validation.js';

export type CliCommand =
  | { readonly kind: 'chat'; readonly db?: string; readonly userId?: number }
  | { readonly kind: 'seed'; readonly file: string; readonly db?: string };

export const USAGE = [
  'Usage:',
  '  rowguard [--db <path>] [--user <id>]',
  '  rowguard seed <file.json> [--db <path>]',
].join('\n');

export function parseCliArgs(args: readonly string[]): E.Either<DomainError, CliCommand> {
  let db: string | undefined;
  let user: string | undefined;
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];
    if (arg === undefined) continue;
    if (arg === '--db' || arg === '-d') {
      if (nextArg === undefined) return E.left(validationError('--db requires a path'));
      db = nextArg;
      i++;
    } else if (arg === '--user' || arg === '-u') {
      if (nextArg === undefined) return E.left(validationError('--user requires an id'));
      user = nextArg;
      i++;
    } else if (arg.startsWith('-')) {
      return E.left(validationError(`unknown option: ${arg}`));
    } else {
      positional.push(arg);
    }
  }

  const [command, file, ...rest] = positional;
  if (command === 'seed') {
    if (file === undefined || rest.length > 0) {
      return E.left(validationError('seed takes exactly one file'));
    }
    if (user !== undefined) return E.left(validationError('--user is not valid with seed'));
    return E.right({ kind: 'seed', file, db });
  }
  if (command !== undefined) return E.left(validationError(`unknown command: ${command}`));

  if (user === undefined) return E.right({ kind: 'chat', db });
  const userId = validatePrincipalId(user);
  if (E.isLeft(userId)) return userId;
  return E.right({ kind: 'chat', db, userId: userId.right });
}
