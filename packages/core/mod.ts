export { BKTree } from "./indexes/BKTree.ts"
export type { DumpedNode } from "./indexes/BKTreeNode.ts"
export type { Distance, Match } from "./types.ts"
export { InvalidRadiusError } from "./errors.ts"
export { hammingDistance, levenshteinDistance } from "./distance.ts"
