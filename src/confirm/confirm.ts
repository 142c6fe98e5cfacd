/**
 * Confirmation collaborators for tools whose policy is `prompt`.
 */

export interface ConfirmationRequest {
  toolName: string;
  toolCallId: string;
  /** Parsed arguments as the model sent them */
  arguments: unknown;
  /** Tool description from its registration */
  description: string;
}

export interface ConfirmationHandler {
  /** Resolve true to run the tool, false to record a rejection. */
  confirm(request: ConfirmationRequest, signal?: AbortSignal): Promise<boolean>;
}

export const autoApprove: ConfirmationHandler = {
  confirm: () => Promise.resolve(true),
};

export const autoDeny: ConfirmationHandler = {
  confirm: () => Promise.resolve(false),
};

/**
 * Adapt a plain callback, e.g. a terminal prompt. Anything but a literal
 * `true` counts as a rejection.
 *
 * @example
 * ```typescript
 * const handler = confirmWith(async ({ toolName }) => {
 *   const answer = await rl.question(`Run ${toolName}? [y/N] `);
 *   return answer.trim().toLowerCase() === 'y';
 * });
 * ```
 */
export function confirmWith(
  callback: (request: ConfirmationRequest, signal?: AbortSignal) => boolean | Promise<boolean>
): ConfirmationHandler {
  return {
    async confirm(request, signal) {
      if (signal?.aborted) return false;
      const answer = await callback(request, signal);
      return answer === true;
    },
  };
}
