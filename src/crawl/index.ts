export * from "./crawler";
export * from "./htmlParser";
export * from "./modificationTracker";
export * from "./plotLocation";
