/**
 * Grain codec
 *
 * `salt-call --out=json` wraps every answer as `{"local": <value>}`. An unset
 * grain comes back as `null`, so anything that does not decode to the
 * expected shape is read as the empty value rather than raised.
 */

import { quote } from "shell-quote";
import { z } from "zod";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("grain-codec");

const EnvelopeSchema = z.object({ local: z.unknown() });

function decodeEnvelope(raw: string): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.debug({ raw, err: error }, "Grain output is not JSON, treating grain as absent");
    return null;
  }

  const envelope = EnvelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    logger.debug({ raw }, "Grain output has no local entry, treating grain as absent");
    return null;
  }
  return envelope.data.local;
}

/**
 * Salt parses CLI values as YAML, so `setval port 8080` stores an integer.
 * Numbers and booleans come back as their text; anything else is undefined.
 */
function asText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

/**
 * Decodes a scalar grain. Absent, `null` or list-shaped values read as "".
 */
export function decodeScalar(raw: string): string {
  return asText(decodeEnvelope(raw)) ?? "";
}

/**
 * Decodes a list grain. Absent, `null` or scalar-shaped values read as [].
 * `null` and nested items are dropped.
 */
export function decodeList(raw: string): string[] {
  const local = decodeEnvelope(raw);
  if (!Array.isArray(local)) return [];
  return local.flatMap((item) => {
    const text = asText(item);
    return text === undefined ? [] : [text];
  });
}

/**
 * Renders one key or value as a single shell word.
 */
export function encodeToken(value: string): string {
  return quote([value]);
}
