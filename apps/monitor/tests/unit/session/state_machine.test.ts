import { describe, expect, it } from "vitest";
import { InvalidSessionTransitionError, transition } from "../../../src/session/state_machine.js";

describe("session transitions", () => {
  it("moves active sessions through draining to stopped", () => {
    expect(transition("active", "stop", "ses_1")).toBe("draining");
    expect(transition("active", "deadline", "ses_1")).toBe("draining");
    expect(transition("draining", "drained", "ses_1")).toBe("stopped");
  });

  it("lets a stop request join a drain in progress", () => {
    expect(transition("draining", "stop", "ses_1")).toBe("draining");
  });

  it("rejects transitions out of order", () => {
    expect(() => transition("active", "drained", "ses_1")).toThrow(InvalidSessionTransitionError);
    expect(() => transition("stopped", "stop", "ses_1")).toThrow(
      "Invalid session transition: session=ses_1 state=stopped event=stop",
    );
  });

  it("carries the session error code", () => {
    try {
      transition("stopped", "deadline", "ses_2");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidSessionTransitionError);
      expect(err).toMatchObject({ code: "INVALID_SESSION_TRANSITION", sessionId: "ses_2" });
    }
  });
});
