export { RegionGrowthGenerator } from "./generator";
export {
  type Region,
  REGION_OUT_OF_BOUNDS,
  REGION_UNCLAIMED,
  UNKNOWN_REGION,
  UNKNOWN_REGION_ID,
} from "./region";
