export * from "./logger";
export * from "./textNormalization";
export * from "./db";
export * from "./fields";
export * from "./collection";
export * from "./normalization";
export * from "./classification";
export * from "./runner";
export * from "./clients/http";
export * from "./clients/embeddings";
