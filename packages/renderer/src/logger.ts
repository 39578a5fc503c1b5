/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Renderer logger
 *
 * Log levels:
 * - error: Always logged - failures that stop a frame or an object from rendering
 * - warn: Always logged - ignored calls, degraded functionality
 * - info: Logged when PARTVIEW_DEBUG is set - lifecycle events
 * - debug: Logged when PARTVIEW_DEBUG is set - detailed debugging info
 *
 * Enable debug logging by setting:
 * - localStorage.setItem('PARTVIEW_DEBUG', 'true') in browser
 * - PARTVIEW_DEBUG=true environment variable in Node.js
 */

export interface LogContext {
  /** Component name (e.g., 'Renderer', 'Scene', 'Viewer') */
  component: string;
  /** Operation being performed (e.g., 'addMesh', 'resize') */
  operation?: string;
  /** Scene object id if applicable */
  objectId?: string;
  /** Scene object kind if applicable */
  objectKind?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

function isDebugEnabled(): boolean {
  if (typeof localStorage !== 'undefined') {
    try {
      return localStorage.getItem('PARTVIEW_DEBUG') === 'true';
    } catch {
      // Storage access denied (sandboxed frame)
      return false;
    }
  }
  if (typeof process !== 'undefined' && process.env) {
    return process.env.PARTVIEW_DEBUG === 'true';
  }
  return false;
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.objectId !== undefined) {
    prefix += ` "${ctx.objectId}"`;
  }
  if (ctx.objectKind) {
    prefix += ` (${ctx.objectKind})`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string) {
  return {
    /**
     * Log an error - always visible in console
     */
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      const line = error !== undefined ? `${prefix} ${message}:` : `${prefix} ${message}`;
      const args: unknown[] = error !== undefined ? [formatError(error)] : [];
      if (ctx?.data !== undefined) args.push(ctx.data);
      console.error(line, ...args);
    },

    /**
     * Log a warning - always visible in console
     */
    warn(message: string, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    /**
     * Log info - only visible when PARTVIEW_DEBUG=true
     */
    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    /**
     * Log debug - only visible when PARTVIEW_DEBUG=true
     */
    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },

    /**
     * Log a caught error with context - visible when PARTVIEW_DEBUG=true
     * Use in catch blocks where the error is handled/recovered
     */
    caught(message: string, error: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.debug(`${prefix} ${message} (recovered):`, formatError(error), ctx.data);
      } else {
        console.debug(`${prefix} ${message} (recovered):`, formatError(error));
      }
    },
  };
}
