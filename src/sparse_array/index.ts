export { SparseArray, type SparseArrayOptions } from "./sparse_array";
