export * from "./logger";
export * from "./db";
export * from "./posting";
export * from "./collection";
export * from "./normalization";
export * from "./classification";
export * from "./runner";
export * from "./clients/http";
export * from "./clients/embeddings";
