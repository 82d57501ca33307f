import { createMySqlPoolFromEnv, hasMySqlConfig } from "./mysql.pool";
import { ResultStore } from "./store";
import { InMemoryResultStore } from "./store.inmem";
import { MySqlResultStore } from "./store.mysql";

export function createResultStoreFromEnv(env: Record<string, string | undefined> = process.env): ResultStore {
  if (hasMySqlConfig(env)) {
    return new MySqlResultStore(createMySqlPoolFromEnv(env), true);
  }
  return new InMemoryResultStore();
}
