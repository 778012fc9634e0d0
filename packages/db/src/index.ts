// State stores
export { InMemoryStateStore } from "./memory-state-store";
