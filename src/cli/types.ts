// ============================================================================
// CLI Types
// ============================================================================

/**
 * CLI 全局选项
 */
export type CLIGlobalOptions = {
  config?: string;
  json?: boolean;
  debug?: boolean;
};

export type SearchCommandOptions = {
  limit?: number;
  app?: string;
  minScore?: number;
};

export type LimitOption = {
  limit: number;
};

export type AppOption = {
  app: string;
};
