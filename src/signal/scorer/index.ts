export { scoreDocument, presenceFromOutcomes } from "./scorer";
