import { Signature } from "./Signature";

export const euclidean = (coords: number | string | string[]) => new Signature(
  typeof coords === "number" ? coords : coords.length,
  0,
);
