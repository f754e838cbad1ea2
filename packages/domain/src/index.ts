export * from "./availability/types";
export * from "./availability/interval";
export * from "./availability/slot-generation";
export * from "./availability/conflicts";
export * from "./availability/gateway";
export * from "./availability/database-gateway";
export * from "./availability/providers";
export * from "./scoring/slot-scorer";
export * from "./scoring/selector";
export * from "./policies/interview-status";
export * from "./policies/rules";
export * from "./repo/types";
export * from "./repo/scheduling-repo";
export * from "./services/settings";
export * from "./services/scheduling-request";
export * from "./services/interview-queries";
export * from "./services/scheduling-service";
export * from "./context";
