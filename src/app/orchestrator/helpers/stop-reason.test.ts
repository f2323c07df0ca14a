import { describe, expect, it } from "vitest";

import { signalFromAbortReason } from "./stop-reason.js";

describe("signalFromAbortReason", () => {
  it("reads the signal the CLI handler aborts with", () => {
    expect(signalFromAbortReason({ signal: "SIGTERM" })).toBe("SIGTERM");
  });

  it("takes a bare signal name", () => {
    expect(signalFromAbortReason("SIGINT")).toBe("SIGINT");
  });

  it("has no signal for the default abort error or other reasons", () => {
    expect(signalFromAbortReason(new DOMException("This operation was aborted", "AbortError"))).toBeUndefined();
    expect(signalFromAbortReason(undefined)).toBeUndefined();
    expect(signalFromAbortReason("")).toBeUndefined();
    expect(signalFromAbortReason({ type: "abort" })).toBeUndefined();
  });
});
