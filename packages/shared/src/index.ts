export * from "./schemas/app-config";
export * from "./schemas/engine-state";
export * from "./schemas/market";
export * from "./schemas/trading";
