export * from "./constants";
export {
  type Charge,
  ChargeFieldGenerator,
  computeChargeStrength,
  type Polarity,
  potentialAt,
} from "./generator";
