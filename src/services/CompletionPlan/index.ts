export * from "./CompletionPlanService";
export * from "./CompletionPlanServiceDefault";
