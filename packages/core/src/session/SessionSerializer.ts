import { SidstoreError } from "../errors";
import type { SessionSnapshot } from "./ISession";

export function serializeSession<TValue>(snapshot: SessionSnapshot<TValue>): string {
  return JSON.stringify(snapshot);
}

/**
 * Parses a snapshot written by {@link serializeSession}. The payload itself is not validated.
 */
export function deserializeSession<TValue>(raw: string): SessionSnapshot<TValue> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new SidstoreError("INTERNAL_ERROR", "Stored session is not valid JSON.", e);
  }

  if (!isSnapshotShape(parsed)) {
    throw new SidstoreError("INTERNAL_ERROR", "Stored session has an unexpected shape.");
  }

  return {
    uid: parsed.uid,
    key: parsed.key,
    value: parsed.value as TValue,
    lastModified: parsed.lastModified,
    revision: parsed.revision,
  };
}

function isSnapshotShape(v: unknown): v is SessionSnapshot<unknown> {
  return (
    typeof v === "object" &&
    v !== null &&
    "uid" in v &&
    typeof v.uid === "string" &&
    "key" in v &&
    typeof v.key === "string" &&
    "value" in v &&
    "lastModified" in v &&
    typeof v.lastModified === "number" &&
    "revision" in v &&
    typeof v.revision === "number"
  );
}
