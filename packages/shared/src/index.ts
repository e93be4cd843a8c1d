export * from "./constants";
export * from "./schemas/config";
export * from "./schemas/tickets";
export * from "./schemas/analysis";
