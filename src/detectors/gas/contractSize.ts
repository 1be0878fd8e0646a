/**
 * Contract Size Detector
 *
 * Stylus rejects programs whose Brotli-compressed WASM exceeds 24 KiB.
 */

import { brotliCompressSync, constants } from "node:zlib";
import { catalogRules } from "../../scoring/ruleCatalog.js";
import type { ContractModel, DetectorContext, RawFinding } from "../../types/index.js";
import { BaseDetector } from "../base.js";

export const STYLUS_SIZE_LIMIT = 24 * 1024;

/** Share of the limit above which the size is reported as a warning. */
const WARNING_RATIO = 0.8;

export function compressedSize(bytes: Uint8Array): number {
  return brotliCompressSync(bytes, {
    params: {
      [constants.BROTLI_PARAM_QUALITY]: constants.BROTLI_MAX_QUALITY,
      [constants.BROTLI_PARAM_SIZE_HINT]: bytes.length,
    },
  }).length;
}

export class ContractSizeDetector extends BaseDetector {
  readonly id = "contract-size";
  readonly name = "Contract Size";
  readonly description = "Compressed WASM size against the Stylus deployment limit";
  readonly category = "performance" as const;
  readonly rules = catalogRules("GAS-008");

  protected override inspectContract(model: ContractModel, _context: DetectorContext): RawFinding[] {
    if (model.artifact === undefined) return [];

    const size = compressedSize(model.artifact);
    const location = { file: model.file, line: 1, column: 1 };
    if (size > STYLUS_SIZE_LIMIT) {
      return [
        this.finding(
          "GAS-008",
          location,
          `Compressed program is ${size} bytes, over the ${STYLUS_SIZE_LIMIT} byte Stylus limit; deployment will fail.`
        ),
      ];
    }
    if (size > STYLUS_SIZE_LIMIT * WARNING_RATIO) {
      return [
        this.finding(
          "GAS-008",
          location,
          `Compressed program is ${size} bytes, within 20% of the ${STYLUS_SIZE_LIMIT} byte Stylus limit.`,
          { match: "partial" }
        ),
      ];
    }
    return [];
  }
}
