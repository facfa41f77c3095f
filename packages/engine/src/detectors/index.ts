import type { Detector } from "../types";
import {
  AccessControl,
  IntegerOverflow,
  Reentrancy,
  OverlappingDispatch,
  UnreachableDispatch,
} from "./detectors-01-05";

export const ALL_DETECTORS: Detector[] = [
  AccessControl,
  IntegerOverflow,
  Reentrancy,
  OverlappingDispatch,
  UnreachableDispatch,
];

export {
  AccessControl,
  IntegerOverflow,
  Reentrancy,
  OverlappingDispatch,
  UnreachableDispatch,
};
