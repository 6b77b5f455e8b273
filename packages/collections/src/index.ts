// Data structures
export { HashSet } from "./hash-set.js";
export { toHashSet } from "./hash-set-factory.js";

// Bags
export { NativeBag, HashBag, LinearBag, createBag, type Bag, type BagKind } from "./bag.js";

// List helpers
export { addRange, indexOf, remove, type Addable } from "./list.js";
