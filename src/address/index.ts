export {
  type WordHasher,
  sha256_hasher,
  address_from_name,
  address_from_slot,
} from "./hasher";
export { AddressSpace, type AddressSpaceOptions } from "./address_space";
