export * from "./defs";
export * from "./ColumnType";
export * from "./Schema";
export * from "./TableRep";
export * from "./attrs";
export * from "./Accum";
export * from "./accum/moments";
export * from "./accum/range";
export * from "./accum/freqTable";
export * from "./accum/valuePool";
export * from "./AttrNeeds";
export * from "./localContrib";
export * from "./combine";
export * from "./assemble";
export * from "./digest";
export * from "./KeyIndex";
export * from "./DivData";
export * from "./errors";
export * from "./errorUtils";
export * from "./result";
export * from "./objectSize";
export * from "./updateAttributes";
