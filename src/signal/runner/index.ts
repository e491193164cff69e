export {
  defaultClock,
  runAlgorithm,
  runAlgorithms,
  findRun,
  findOccurrenceDisagreements,
} from "./algorithmRunner";
