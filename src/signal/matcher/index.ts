export { isWordBoundary } from "./wordBoundary";
export { naiveSearch } from "./naiveSearch";
export { rabinKarpSearch, modPow, polynomialHash } from "./rabinKarpSearch";
export { kmpSearch, buildLps } from "./kmpSearch";
export {
  getMatcher,
  countOccurrences,
  contains,
  type MatcherOptions,
} from "./registry";
