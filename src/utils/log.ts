export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export const RULE = '━'.repeat(74);
export const STEP_RULE = '─'.repeat(74);

function stamp(scope: string | undefined, message: string): string {
  const ts = new Date().toISOString();
  return scope ? `[${ts}] [${scope}] ${message}` : `[${ts}] ${message}`;
}

export function createLogger(scope?: string): Logger {
  return {
    info(message) {
      // eslint-disable-next-line no-console
      console.log(stamp(scope, message));
    },
    warn(message) {
      // eslint-disable-next-line no-console
      console.warn(stamp(scope, message));
    },
    error(message, err) {
      if (err === undefined) {
        // eslint-disable-next-line no-console
        console.error(stamp(scope, message));
        return;
      }
      // eslint-disable-next-line no-console
      console.error(stamp(scope, message), err);
    }
  };
}

export function banner(logger: Logger, title: string) {
  logger.info(RULE);
  logger.info(title);
  logger.info(RULE);
}

export function step(logger: Logger, title: string) {
  logger.info('');
  logger.info(STEP_RULE);
  logger.info(title);
  logger.info(STEP_RULE);
}
