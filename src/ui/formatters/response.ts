import { RpcError } from '@/errors/index.js';
import type { RpcResponse } from '@/protocol/index.js';
import { joinLines } from '@/ui/formatting.js';

/**
 * Human-readable rendering of a response: the pretty-printed result, or the
 * error's one-line description followed by its field and context.
 *
 * @example
 * ```typescript
 * formatResponse(response);
 * // → '{\n  "pong": true\n}'
 * ```
 */
export function formatResponse(response: RpcResponse): string {
  if (response.success) {
    return JSON.stringify(response.result, null, 2);
  }

  const error = RpcError.fromStructuredError(response.error);
  const data = response.error.data;
  return joinLines(
    `Error: ${error.describe()}`,
    data?.field !== undefined && `  field: ${data.field}`,
    data?.constraints !== undefined && `  constraints: ${JSON.stringify(data.constraints)}`,
    data?.context !== undefined && `  context: ${JSON.stringify(data.context)}`
  );
}
