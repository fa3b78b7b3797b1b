export { createRunCommand } from "./run.js";
export { createPhaseCommand } from "./phase.js";
export { createDecideCommand } from "./decide.js";
export { createSummaryCommand, createSessionsCommand } from "./summary.js";
export { createActionsCommand, createCommandsCommand } from "./audit-log.js";
export { createStatsCommand } from "./stats.js";
export { createToolsCommand, createAgentsCommand } from "./tools.js";
export { createHealthCommand } from "./health.js";
export { createConfigCommand } from "./config.js";
