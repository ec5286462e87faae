import type { FieldMap } from "../../config.js";
import type { ChargeResult } from "./types.js";

function readField(source: unknown, field: string): unknown {
  if (typeof source !== "object" || source === null) return undefined;
  if (!Object.prototype.hasOwnProperty.call(source, field)) return undefined;
  return Reflect.get(source, field);
}

/**
 * Project a provider record onto the configured local field names.
 *
 * `{ total: "amount" }` copies `record.amount`; `{ brand: { source: "brand" } }`
 * copies `record.source.brand`. Anything not named in the map is dropped.
 */
export function formatChargeResult(record: unknown, fields: FieldMap): ChargeResult {
  const result: ChargeResult = {};

  for (const [local, mapped] of Object.entries(fields)) {
    if (typeof mapped === "string") {
      result[local] = readField(record, mapped);
      continue;
    }
    for (const [subobject, field] of Object.entries(mapped)) {
      result[local] = readField(readField(record, subobject), field);
    }
  }

  return result;
}
