export * from "./types.js";
export * from "./errors/config.errors.js";
export * from "./errors/github.errors.js";
export * from "./errors/rule.errors.js";
export * from "./config/loadConfig.js";
export * from "./config/token.js";
export * from "./logging/logger.js";
export * from "./github/httpClient.js";
export * from "./github/rateLimitGate.js";
export { systemClock, type Clock, type RateLimitSnapshot } from "./github/rateLimitHelpers.js";
export * from "./github/metadataClient.js";
export * from "./github/repositoryRef.js";
export * from "./github/repositorySelector.js";
export * from "./rules/rule.js";
export * from "./rules/registry.js";
export * from "./audit/progress.js";
export * from "./audit/runAudit.js";
export * from "./report/grouping.js";
export * from "./report/formatters.js";
export * from "./fix/applyFixes.js";
export { runAuditCommand, type AuditCommandContext, type AuditCommandOptions } from "./commands/audit.js";
