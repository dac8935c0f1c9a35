export * from "./frame";
export * from "./MemoryDivData";
export * from "./LocalExecutor";
