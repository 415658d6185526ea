/**
 * Handler Registry
 *
 * Maps command names to handlers. Owned by one server instance; the receive
 * path only reads it. Registration and lookup run on the event loop thread,
 * so a lookup never observes a half-applied change.
 */

import { validateCommandName, type RpcRequest } from '@/protocol/index.js';
import type { JsonValue } from '@/types.js';

/**
 * Per-invocation context handed to a handler.
 */
export interface HandlerContext {
  /** Aborted when the request's deadline passes */
  signal: AbortSignal;
  /** Deadline applied to this invocation, in seconds */
  timeout: number;
}

/**
 * Result a handler may produce. `undefined` (or no return) becomes `null`.
 */
export type HandlerResult = JsonValue | undefined;

/**
 * A command implementation. Report a structured failure by throwing RpcError;
 * any other throw is answered with INTERNAL_ERROR.
 *
 * @example
 * ```typescript
 * const handler: RequestHandler = async (request, { signal }) => {
 *   const workspace = await createWorkspace(String(request.args?.['name']), signal);
 *   return { id: workspace.id };
 * };
 * ```
 */
export type RequestHandler = (
  request: RpcRequest,
  context: HandlerContext
) => HandlerResult | Promise<HandlerResult>;

export class HandlerRegistry {
  private readonly handlers = new Map<string, RequestHandler>();

  /**
   * Register a handler, replacing any previous one for the command.
   *
   * @throws RpcError SECURITY_VIOLATION if the command name is invalid
   */
  register(command: string, handler: RequestHandler): void {
    validateCommandName(command);
    this.handlers.set(command, handler);
  }

  /**
   * @returns false if no handler was registered for the command
   */
  unregister(command: string): boolean {
    return this.handlers.delete(command);
  }

  get(command: string): RequestHandler | undefined {
    return this.handlers.get(command);
  }

  has(command: string): boolean {
    return this.handlers.has(command);
  }

  /** Registered command names, sorted. */
  commands(): string[] {
    return [...this.handlers.keys()].sort();
  }

  get size(): number {
    return this.handlers.size;
  }
}
