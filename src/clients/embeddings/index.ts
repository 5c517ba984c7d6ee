export { EmbeddingsClient } from "./embeddingsClient";
