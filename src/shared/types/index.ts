// ============================================================================
// Types Index - Re-export all shared types
// ============================================================================

export * from './capture';
