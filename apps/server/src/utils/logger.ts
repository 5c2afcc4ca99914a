/**
 * Logger seam for code that runs outside a request.
 *
 * Fastify's pino logger (and its children) satisfies this shape, so pollers
 * and services take `app.log.child({ category })` in production and a plain
 * object in tests.
 */

export interface Logger {
  debug(obj: object | string, msg?: string): void;
  info(obj: object | string, msg?: string): void;
  warn(obj: object | string, msg?: string): void;
  error(obj: object | string, msg?: string): void;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A logger that can hand out children with extra bindings
 */
export interface ParentLogger extends Logger {
  child(bindings: Record<string, unknown>): Logger;
}
