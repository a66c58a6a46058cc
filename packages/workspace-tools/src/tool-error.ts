import type { ToolResult } from '@crew-control/contracts';

export function toolError(input: {
  code: string;
  message: string;
  hint?: string;
  details?: Record<string, unknown>;
}): ToolResult {
  const header = `${input.code}: ${input.message}`;
  const hintBlock = input.hint ? `\n\nHint: ${input.hint}` : '';
  return {
    success: false,
    error: `${header}${hintBlock}`,
    metadata: {
      errorCode: input.code,
      ...(input.details ?? {}),
    },
  };
}
