export * from "./markupConverter";
export * from "./mentionExtractor";
export * from "./mentionRun";
export * from "./recordAssembler";
export * from "./textNormalizer";
