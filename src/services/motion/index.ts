export * from "./tableTransformer";
export * from "./pathResolver";
export * from "./runEnumerator";
export * from "./processor";
export * from "./analysis";
