import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestEnv, type TestEnv } from "../../__tests__/testEnv.js";
import { parseSessionState, readSessionState, sessionIdFor, startSession } from "../sessionStore.js";

describe("session store", () => {
  let env: TestEnv;

  beforeEach(async () => {
    env = await createTestEnv("2026-10-19T07:52:30.500Z");
  });

  afterEach(async () => {
    await env.cleanup();
  });

  it("returns null when no session has been started", async () => {
    expect(await readSessionState(env)).toBeNull();
  });

  it("starts a session and reads it back", async () => {
    const state = await startSession(env, "sam");
    expect(state).toEqual({
      session_id: "2026-10-19_0752",
      user_id: "sam",
      start_time: "2026-10-19T07:52:30.500Z",
      start_unix: Math.floor(Date.parse("2026-10-19T07:52:30.500Z") / 1000),
      session_phase: "active",
    });
    expect(await readSessionState(env)).toEqual(state);
  });

  it("rejects unreadable or incomplete state", async () => {
    await env.writeText("session/current.json", "{not json");
    expect(await readSessionState(env)).toBeNull();

    await env.writeJson("session/current.json", { user_id: "sam" });
    expect(await readSessionState(env)).toBeNull();

    await env.writeJson("session/current.json", { user_id: "sam", start_time: "this morning" });
    expect(await readSessionState(env)).toBeNull();
  });

  it("keeps unknown fields and defaults a missing user", () => {
    const state = parseSessionState({ start_time: "2026-10-19T07:00:00Z", mood: "focused" });
    expect(state).toEqual({ start_time: "2026-10-19T07:00:00Z", user_id: "", mood: "focused" });
  });

  it("derives a session id from the start time in the configured zone", () => {
    const state = { user_id: "sam", start_time: "2026-10-19T07:52:00Z" };
    expect(sessionIdFor(state, "UTC")).toBe("2026-10-19_0752");
    expect(sessionIdFor(state, "America/New_York")).toBe("2026-10-19_0352");
    expect(sessionIdFor({ ...state, session_id: "custom-id" }, "UTC")).toBe("custom-id");
  });
});
