export { RollingWindow } from "./rollingWindow";
export type { RollingWindowSnapshot } from "./rollingWindow";
export { populationStdev, rollingPopulationStdev } from "./stdev";
