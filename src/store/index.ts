import { AppConfig } from "../config";
import { OrderStore } from "./types";
import { SqliteOrderStore } from "./sqliteStore";

export function createStore(config: AppConfig): OrderStore {
  return new SqliteOrderStore(config.storePath);
}

export { InMemoryOrderStore } from "./memoryStore";
export { SqliteOrderStore } from "./sqliteStore";
export * from "./types";
