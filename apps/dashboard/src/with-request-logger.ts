import type { Logger } from 'pino';

interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

export interface WithRequestLoggerOptions<TResult> {
  logger: Logger;
  method: string;
  path: string;
  sessionId: string;
  summary?: (result: TResult) => Record<string, unknown>;
  run: () => Promise<TResult>;
}

export async function withRequestLogger<TResult>({
  logger,
  method,
  path,
  sessionId,
  summary,
  run,
}: WithRequestLoggerOptions<TResult>): Promise<TResult> {
  const startedAt = Date.now();
  const common = { method, path, sessionId };

  logger.debug({ event: 'request_started', ...common }, 'Request started');

  try {
    const result = await run();
    logger.info(
      {
        event: 'request_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Request completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'request_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Request failed',
    );
    throw error;
  }
}
