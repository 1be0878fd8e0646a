/**
 * Built-in detectors
 *
 * The default list is built once and frozen. Callers wanting a different
 * set pass their own list through `config.detectors`.
 */

import type { Category, Detector } from "../types/index.js";
import { ContractSizeDetector } from "./gas/contractSize.js";
import { GasCostDetector } from "./gas/gasCost.js";
import { UnboundedLoopDetector } from "./gas/loops.js";
import { MemoryAllocationDetector } from "./gas/memory.js";
import { RedundantCallDetector } from "./gas/redundantCalls.js";
import { StorageAccessDetector } from "./gas/storageAccess.js";
import { ComplexityDetector } from "./quality/complexity.js";
import { DocumentationDetector } from "./quality/documentation.js";
import { ErrorHandlingDetector } from "./quality/errorHandling.js";
import { EventEmissionDetector } from "./quality/events.js";
import { NamingDetector } from "./quality/naming.js";
import { AccessControlDetector } from "./security/accessControl.js";
import { UncheckedArithmeticDetector } from "./security/arithmetic.js";
import { EnvironmentDetector } from "./security/environment.js";
import { ExternalCallDetector } from "./security/externalCalls.js";
import { ReentrancyDetector } from "./security/reentrancy.js";
import { UnsafeCodeDetector } from "./security/unsafeCode.js";

export const DEFAULT_DETECTORS: readonly Detector[] = Object.freeze([
  // Security
  new ReentrancyDetector(),
  new AccessControlDetector(),
  new UncheckedArithmeticDetector(),
  new ExternalCallDetector(),
  new UnsafeCodeDetector(),
  new EnvironmentDetector(),
  // Performance
  new GasCostDetector(),
  new StorageAccessDetector(),
  new RedundantCallDetector(),
  new UnboundedLoopDetector(),
  new MemoryAllocationDetector(),
  new ContractSizeDetector(),
  // Quality
  new DocumentationDetector(),
  new ComplexityDetector(),
  new ErrorHandlingDetector(),
  new NamingDetector(),
  new EventEmissionDetector(),
]);

export function detectorsFor(
  categories: readonly Category[],
  detectors: readonly Detector[] = DEFAULT_DETECTORS
): Detector[] {
  return detectors.filter((detector) => categories.includes(detector.category));
}

export { BaseDetector, type FindingDetails, type FunctionScope } from "./base.js";
export { ReentrancyDetector } from "./security/reentrancy.js";
export { AccessControlDetector } from "./security/accessControl.js";
export { UncheckedArithmeticDetector } from "./security/arithmetic.js";
export { ExternalCallDetector } from "./security/externalCalls.js";
export { UnsafeCodeDetector } from "./security/unsafeCode.js";
export { EnvironmentDetector } from "./security/environment.js";
export { GasCostDetector } from "./gas/gasCost.js";
export { StorageAccessDetector } from "./gas/storageAccess.js";
export { RedundantCallDetector } from "./gas/redundantCalls.js";
export { UnboundedLoopDetector } from "./gas/loops.js";
export { MemoryAllocationDetector } from "./gas/memory.js";
export { ContractSizeDetector, STYLUS_SIZE_LIMIT, compressedSize } from "./gas/contractSize.js";
export { DocumentationDetector } from "./quality/documentation.js";
export { ComplexityDetector } from "./quality/complexity.js";
export { ErrorHandlingDetector } from "./quality/errorHandling.js";
export { NamingDetector } from "./quality/naming.js";
export { EventEmissionDetector } from "./quality/events.js";
