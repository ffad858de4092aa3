import { describe, expect, it } from "vitest";
import { deserializeSession, serializeSession, SidstoreError, type SessionSnapshot } from "../src";

describe("SessionSerializer", () => {
  it("restores_a_serialized_snapshot", () => {
    const snapshot: SessionSnapshot<{ cart: string[] }> = {
      uid: "u1",
      key: "_ssid",
      value: { cart: ["apple"] },
      lastModified: 1_700_000_000_000,
      revision: 3,
    };

    expect(deserializeSession<{ cart: string[] }>(serializeSession(snapshot))).toEqual(snapshot);
  });

  it("rejects_malformed_json", () => {
    expect(() => deserializeSession("{not json")).toThrow(SidstoreError);
  });

  it("rejects_objects_missing_fields", () => {
    let caught: unknown;
    try {
      deserializeSession(JSON.stringify({ uid: "u1", key: "", lastModified: 1, revision: 0 }));
    } catch (e) {
      caught = e;
    }

    expect(caught).toMatchObject({
      code: "INTERNAL_ERROR",
      message: "Stored session has an unexpected shape.",
    });
  });
});
