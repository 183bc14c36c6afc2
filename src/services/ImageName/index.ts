export * from "./ImageName";
export * from "./ImageNameFormatter";
export * from "./ImageNameParser";
export * from "./FloatText";
