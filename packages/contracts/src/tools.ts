/**
 * @module @crew-control/contracts/tools
 * Tool ports consumed by worker teams.
 */

export interface ToolResult {
  success: boolean;
  output?: string;
  error?: string;
  metadata?: Record<string, unknown>;
}

export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchTool {
  search(query: string): Promise<SearchHit[]>;
}

export interface WebScrapeTool {
  scrape(urls: readonly string[]): Promise<string>;
}

export interface SandboxSubmission {
  stdout: string;
  stderr: string;
  resultBindings: Record<string, unknown>;
}

/**
 * Sandboxed code execution. A non-empty stderr counts as failure.
 */
export interface SandboxExecutor {
  submit(code: string, context?: Record<string, unknown>): Promise<SandboxSubmission>;
}
