export * from "./pageRange";
export * from "./textExtractor";
