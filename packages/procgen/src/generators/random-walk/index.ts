export * from "./constants";
export {
  type CarveSummary,
  generateRandomWalkMap,
  RandomWalkGenerator,
} from "./generator";
