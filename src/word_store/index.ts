export { type WordStore, MemoryWordStore } from "./word_store";
export { TracingWordStore } from "./tracing_word_store";
