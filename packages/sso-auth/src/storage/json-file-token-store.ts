import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import { err, ok, ResultAsync, type Result } from 'neverthrow';
import { z } from 'zod';
import type { AuthError } from '../types.js';
import type { CharacterToken } from '../lifecycle/character-token.js';
import { createStorageError } from '../errors.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { copyToken, selectTokens, tokenKey } from './memory-token-store.js';
import type { TokenStore } from './types.js';

const FILE_VERSION = 1;

const characterTokenSchema = z.object({
  identityId: z.number().int().nonnegative(),
  displayName: z.string(),
  accessToken: z.string(),
  refreshToken: z.string(),
  expiresAt: z.number(),
  scopes: z.array(z.string()),
  tokenType: z.string(),
  clientId: z.string(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

const tokenFileSchema = z.object({
  version: z.literal(FILE_VERSION),
  tokens: z.array(characterTokenSchema),
});

type TokenMap = Map<string, CharacterToken>;

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Creates a token store backed by one JSON file.
 *
 * Writes go to a temporary file beside the target which is then renamed
 * over it, so a reader sees either the old or the new file. Mutations run
 * one at a time, each re-reading the file, so concurrent puts never drop
 * each other's tokens.
 *
 * @param filePath - Path of the JSON file; created on first write
 * @param logger - Logger (optional)
 *
 * @example
 * ```typescript
 * const store = createJsonFileTokenStore('/home/me/.config/my-app/tokens.json');
 * const tokens = await store.list();
 * ```
 */
export const createJsonFileTokenStore = (
  filePath: string,
  logger: Logger = createLogger('token-store')
): TokenStore => {
  // Tail of the mutation queue; never rejects
  let writeChain: Promise<void> = Promise.resolve();

  const load = async (): Promise<Result<TokenMap, AuthError>> => {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return ok(new Map());
      }
      return err(createStorageError(`Failed to read token file ${filePath}`, error));
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      return err(createStorageError(`Token file ${filePath} is not valid JSON`, error));
    }

    const parsed = tokenFileSchema.safeParse(json);
    if (!parsed.success) {
      return err(createStorageError(`Token file ${filePath} has an unexpected shape`, parsed.error));
    }

    return ok(
      new Map(
        parsed.data.tokens.map((token) => [tokenKey(token.clientId, token.identityId), token])
      )
    );
  };

  const save = async (tokens: TokenMap): Promise<Result<void, AuthError>> => {
    const document = {
      version: FILE_VERSION,
      tokens: selectTokens(tokens.values(), undefined),
    };
    const tempPath = `${filePath}.${randomUUID()}.tmp`;

    try {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, {
        encoding: 'utf8',
        mode: 0o600,
      });
      await rename(tempPath, filePath);
      return ok(undefined);
    } catch (error) {
      const cleanup = await ResultAsync.fromPromise(rm(tempPath, { force: true }), (cause) => cause);
      if (cleanup.isErr()) {
        logger.warn({ tempPath, cause: cleanup.error }, 'failed to remove temporary token file');
      }
      return err(createStorageError(`Failed to write token file ${filePath}`, error));
    }
  };

  /**
   * Queues a read-modify-write. A failed mutation does not block later ones.
   */
  const mutate = <T>(
    change: (tokens: TokenMap) => { readonly result: T; readonly changed: boolean }
  ): Promise<Result<T, AuthError>> => {
    const run = async (): Promise<Result<T, AuthError>> => {
      const loaded = await load();
      if (loaded.isErr()) {
        return err(loaded.error);
      }

      const { result, changed } = change(loaded.value);
      if (!changed) {
        return ok(result);
      }

      const saved = await save(loaded.value);
      return saved.map(() => result);
    };

    const next = writeChain.then(run);
    // The queue only orders mutations; each caller sees its own outcome through `next`
    writeChain = next.then(
      () => undefined,
      (error: unknown) => {
        logger.error({ err: error }, 'token file mutation failed unexpectedly');
      }
    );
    return next;
  };

  const get = async (
    clientId: string,
    identityId: number
  ): Promise<Result<CharacterToken | undefined, AuthError>> => {
    await writeChain;
    const loaded = await load();
    return loaded.map((tokens) => {
      const token = tokens.get(tokenKey(clientId, identityId));
      return token === undefined ? undefined : copyToken(token);
    });
  };

  const list = async (clientId?: string): Promise<Result<readonly CharacterToken[], AuthError>> => {
    await writeChain;
    const loaded = await load();
    return loaded.map((tokens) => selectTokens(tokens.values(), clientId));
  };

  const put = (token: CharacterToken): Promise<Result<void, AuthError>> =>
    mutate((tokens) => {
      tokens.set(tokenKey(token.clientId, token.identityId), copyToken(token));
      return { result: undefined, changed: true };
    });

  const deleteToken = (clientId: string, identityId: number): Promise<Result<boolean, AuthError>> =>
    mutate((tokens) => {
      const existed = tokens.delete(tokenKey(clientId, identityId));
      return { result: existed, changed: existed };
    });

  return { get, put, list, delete: deleteToken };
};
