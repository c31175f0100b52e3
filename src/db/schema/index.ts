export { aiDecisionLogs } from './ai-decision-logs.js';
