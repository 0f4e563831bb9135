export * from "./schemas/app-config";
export * from "./schemas/bot-state";
export * from "./schemas/ledger";
export * from "./schemas/market";
