export * from "./FileRenamer";
export * from "./FileRenamerDefault";
