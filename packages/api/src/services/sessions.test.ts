import assert from "node:assert/strict";
import { test } from "node:test";
import { eq } from "drizzle-orm";
import { sessions } from "../db/schema.js";
import { upsertGoogleUser } from "../models/users.js";
import { createMockRequest, createTestContext } from "../testUtils.js";
import { sha256Base64Url } from "../utils/crypto.js";
import {
  cleanupExpiredSessions,
  createSession,
  deleteSession,
  getSession,
  getSessionToken,
} from "./sessions.js";

test("createSession stores only the hash of the session token", async () => {
  const { context, close } = await createTestContext();

  try {
    const user = await upsertGoogleUser(context, { googleSub: "google-sub-1" });
    const created = await createSession(context, user.id);
    const stored = await context.db.select().from(sessions);

    assert.equal(stored.length, 1);
    assert.equal(stored[0]?.id, sha256Base64Url(created.sessionToken));
    assert.notEqual(stored[0]?.id, created.sessionToken);
    assert.equal(stored[0]?.userId, user.id);
    assert.match(created.sessionToken, /^[A-Za-z0-9_-]{43}$/);
  } finally {
    await close();
  }
});

test("createSession honours the configured lifetime", async () => {
  const { context, close } = await createTestContext({ sessionLifetimeSeconds: 120 });

  try {
    const user = await upsertGoogleUser(context, { googleSub: "google-sub-1" });
    const before = Date.now();
    const created = await createSession(context, user.id);
    const delta = created.expiresAt.getTime() - before;

    assert.ok(delta >= 120_000 && delta < 125_000);
  } finally {
    await close();
  }
});

test("getSession resolves a live token and ignores unknown ones", async () => {
  const { context, close } = await createTestContext();

  try {
    const user = await upsertGoogleUser(context, { googleSub: "google-sub-1" });
    const { sessionToken } = await createSession(context, user.id);

    const session = await getSession(context, sessionToken);
    assert.ok(session);
    assert.equal(session.userId, user.id);
    assert.equal(await getSession(context, "not-a-session"), null);
  } finally {
    await close();
  }
});

test("getSession deletes an expired session", async () => {
  const { context, close } = await createTestContext();

  try {
    const user = await upsertGoogleUser(context, { googleSub: "google-sub-1" });
    const { sessionToken } = await createSession(context, user.id);
    const id = sha256Base64Url(sessionToken);
    await context.db
      .update(sessions)
      .set({ expiresAt: new Date(Date.now() - 60_000) })
      .where(eq(sessions.id, id));

    assert.equal(await getSession(context, sessionToken), null);
    assert.deepEqual(await context.db.select().from(sessions), []);
  } finally {
    await close();
  }
});

test("deleteSession reports whether a session was removed", async () => {
  const { context, close } = await createTestContext();

  try {
    const user = await upsertGoogleUser(context, { googleSub: "google-sub-1" });
    const { sessionToken } = await createSession(context, user.id);

    assert.equal(await deleteSession(context, sessionToken), true);
    assert.equal(await deleteSession(context, sessionToken), false);
    assert.equal(await getSession(context, sessionToken), null);
  } finally {
    await close();
  }
});

test("cleanupExpiredSessions removes only expired sessions", async () => {
  const { context, close } = await createTestContext();

  try {
    const user = await upsertGoogleUser(context, { googleSub: "google-sub-1" });
    const live = await createSession(context, user.id);
    await context.db.insert(sessions).values([
      { id: "expired-1", userId: user.id, expiresAt: new Date(Date.now() - 1000) },
      { id: "expired-2", userId: user.id, expiresAt: new Date(Date.now() - 2000) },
    ]);

    assert.equal(await cleanupExpiredSessions(context), 2);
    const remaining = await context.db.select({ id: sessions.id }).from(sessions);
    assert.deepEqual(remaining, [{ id: sha256Base64Url(live.sessionToken) }]);
  } finally {
    await close();
  }
});

test("getSessionToken reads bearer tokens only", () => {
  const bearer = createMockRequest({
    url: "/whoami",
    headers: { authorization: "Bearer token-123" },
  });
  const lowercase = createMockRequest({
    url: "/whoami",
    headers: { authorization: "bearer token-456" },
  });
  const basic = createMockRequest({
    url: "/whoami",
    headers: { authorization: "Basic dXNlcjpwYXNz" },
  });

  assert.equal(getSessionToken(bearer), "token-123");
  assert.equal(getSessionToken(lowercase), "token-456");
  assert.equal(getSessionToken(basic), null);
  assert.equal(getSessionToken(createMockRequest({ url: "/whoami" })), null);
});
