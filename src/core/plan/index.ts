export { createExecutionPlan, type ExecutionPlan, type PlanEntry, type PlanReason } from './planner.js';
