export { TombstoneLog } from "./tombstone_log";
