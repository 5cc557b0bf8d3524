export { invokeTool, type AgentTool, type ToolContext } from './base.ts';
export { createCronTool, cronToolParameters, type CronToolParams } from './cron.ts';
