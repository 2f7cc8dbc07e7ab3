/**
 * Minimal logger contract shared by library modules.
 *
 * `console` satisfies it, and so does Fastify's pino instance.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

/**
 * A logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};
