export * from "./src/types-protocol.js";
export * from "./src/errors.js";
export { createConsoleLogger, scopedLogger, silentLogger, type Logger } from "./src/logger.js";
export * from "./src/task.js";
export * from "./src/outcome.js";
export * from "./src/protocol.js";
export type { BeliefContext, BeliefOracle, DecisionContext, GatewayOracleOpts, ReplyContext } from "./src/oracle.js";
export { createGatewayOracle } from "./src/oracle.js";
export { createGatewayCaller, type GatewayCaller, type GatewayCallerOpts } from "./src/gateway.js";
export { buildSystemPrompt } from "./src/prompts.js";
export { extractJsonObject, parseBeliefResponse, parseDecisionResponse, parseReplyResponse } from "./src/response-parser.js";
export * from "./src/single-agent.js";
export * from "./src/trial-log.js";
export * from "./src/trial-history.js";
export * from "./src/batch.js";
export * from "./src/aggregate.js";
export { formatAggregationReport } from "./src/report.js";
export { ExperimentConfigSchema, type ExperimentConfigInput } from "./src/config-schema.js";
export * from "./src/config.js";
export { runCli, type CliDeps } from "./src/cli.js";
