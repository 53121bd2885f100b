import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { __getMailOutboxForTests, __resetMailForTests } from "../src/modules/mail/mail.service.js";
import { hashOpaqueToken } from "../src/shared/auth.js";
import { verifyPassword } from "../src/shared/password.js";
import { resetStore, store } from "./fakes/store.js";
import { makeApp } from "./test-app.js";
import { seedUser, TEST_PASSWORD } from "./test-auth.js";

vi.mock("../src/shared/db.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../src/shared/db.js")>()),
  withTransaction: (await import("./fakes/db.js")).withTransaction,
}));
vi.mock("../src/modules/users/users.repository.js", () => import("./fakes/users.repository.js"));
vi.mock("../src/modules/auth/auth.repository.js", () => import("./fakes/auth.repository.js"));

async function waitForMail(count: number) {
  await vi.waitFor(() => {
    expect(__getMailOutboxForTests()).toHaveLength(count);
  });
  return __getMailOutboxForTests()[count - 1];
}

function tokenFromLink(text: string, route: "confirmed_email" | "reset_password"): string {
  const match = new RegExp(`/api/auth/${route}/([A-Za-z0-9_-]+)`).exec(text);
  if (!match?.[1]) {throw new Error(`No ${route} link in mail`);}
  return match[1];
}

describe("Auth: signup and email confirmation", () => {
  beforeEach(() => {
    resetStore();
    __resetMailForTests();
  });

  it("POST /api/auth/signup creates an unconfirmed user and mails a confirmation link", async () => {
    const app = makeApp();

    const res = await request(app)
      .post("/api/auth/signup")
      .send({ username: "alice", email: "Alice@Example.com", password: "secret1" });

    expect(res.status).toBe(201);
    expect(res.body.success).toBe(true);
    expect(res.body.data.detail).toBe("User successfully created. Check your email for confirmation.");
    expect(res.body.data.user).toEqual({
      id: 1,
      username: "alice",
      email: "alice@example.com",
      avatar: expect.stringMatching(/^https:\/\/www\.gravatar\.com\/avatar\/[0-9a-f]{32}\?d=identicon$/),
      confirmed: false,
      created_at: expect.any(String),
    });
    expect(res.body.data.user).not.toHaveProperty("password_hash");

    const mail = await waitForMail(1);
    expect(mail?.to).toBe("alice@example.com");
    expect(mail?.subject).toBe("Confirm your email");
    expect(mail?.text).toContain("http://contacts.test/api/auth/confirmed_email/");
  });

  it("POST /api/auth/signup with a taken email -> 409", async () => {
    const app = makeApp();
    await seedUser({ email: "taken@example.com" });

    const res = await request(app)
      .post("/api/auth/signup")
      .send({ username: "bob", email: "taken@example.com", password: "secret1" });

    expect(res.status).toBe(409);
    expect(res.body).toEqual({ success: false, error: "Account already exists", code: "CONFLICT" });
  });

  it("POST /api/auth/signup with a short password -> 422", async () => {
    const app = makeApp();

    const res = await request(app)
      .post("/api/auth/signup")
      .send({ username: "carol", email: "carol@example.com", password: "123" });

    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      success: false,
      error: "Validation error: password: String must contain at least 6 character(s)",
      code: "VALIDATION_ERROR",
    });
  });

  it("GET /api/auth/confirmed_email/:token confirms once, then reports already confirmed", async () => {
    const app = makeApp();

    await request(app)
      .post("/api/auth/signup")
      .send({ username: "dave", email: "dave@example.com", password: "secret1" })
      .expect(201);
    const mail = await waitForMail(1);
    const token = tokenFromLink(mail?.text ?? "", "confirmed_email");

    const first = await request(app).get(`/api/auth/confirmed_email/${token}`);
    expect(first.status).toBe(200);
    expect(first.body.data).toEqual({ message: "Email confirmed" });
    expect(store.users.get(1)?.confirmed).toBe(true);

    const second = await request(app).get(`/api/auth/confirmed_email/${token}`);
    expect(second.status).toBe(200);
    expect(second.body.data).toEqual({ message: "Your email is already confirmed" });
  });

  it("GET /api/auth/confirmed_email/:token with an unknown token -> 400", async () => {
    const app = makeApp();

    const res = await request(app).get("/api/auth/confirmed_email/not-a-real-token");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: "Verification error", code: "BAD_REQUEST" });
  });

  it("GET /api/auth/confirmed_email/:token with an expired token -> 400", async () => {
    const app = makeApp();
    await request(app)
      .post("/api/auth/signup")
      .send({ username: "erin", email: "erin@example.com", password: "secret1" })
      .expect(201);
    const token = tokenFromLink((await waitForMail(1))?.text ?? "", "confirmed_email");

    for (const row of store.userTokens.values()) {
      row.expiresAt = new Date(Date.now() - 1000);
    }

    const res = await request(app).get(`/api/auth/confirmed_email/${token}`);
    expect(res.status).toBe(400);
    expect(store.users.get(1)?.confirmed).toBe(false);
  });

  it("POST /api/auth/request_email resends for unconfirmed users only", async () => {
    const app = makeApp();
    await seedUser({ email: "pending@example.com", confirmed: false });
    await seedUser({ email: "done@example.com", confirmed: true });

    const pending = await request(app).post("/api/auth/request_email").send({ email: "pending@example.com" });
    expect(pending.status).toBe(200);
    expect(pending.body.data).toEqual({ message: "Check your email for confirmation." });
    expect((await waitForMail(1))?.to).toBe("pending@example.com");

    const done = await request(app).post("/api/auth/request_email").send({ email: "done@example.com" });
    expect(done.body.data).toEqual({ message: "Your email is already confirmed" });

    const unknown = await request(app).post("/api/auth/request_email").send({ email: "nobody@example.com" });
    expect(unknown.body.data).toEqual({ message: "Check your email for confirmation." });
    expect(__getMailOutboxForTests()).toHaveLength(1);
  });
});

describe("Auth: login, refresh and logout", () => {
  beforeEach(() => {
    resetStore();
    __resetMailForTests();
  });

  it("POST /api/auth/login returns a bearer token pair and sets the refresh cookie", async () => {
    const app = makeApp();
    const { user } = await seedUser({ email: "frank@example.com" });

    const res = await request(app)
      .post("/api/auth/login")
      .send({ email: "frank@example.com", password: TEST_PASSWORD });

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({
      access_token: expect.any(String),
      refresh_token: expect.any(String),
      token_type: "bearer",
      expires_in: 900,
    });

    const cookie = String(res.headers["set-cookie"]);
    expect(cookie).toContain(`refresh_token=${res.body.data.refresh_token}`);
    expect(cookie).toContain("Path=/api/auth");
    expect(cookie).toContain("HttpOnly");

    const me = await request(app).get("/api/users/me").set("Authorization", `Bearer ${res.body.data.access_token}`);
    expect(me.status).toBe(200);
    expect(me.body.data.id).toBe(user.id);
  });

  it("POST /api/auth/login accepts an OAuth2-style form with username", async () => {
    const app = makeApp();
    await seedUser({ email: "gina@example.com" });

    const res = await request(app)
      .post("/api/auth/login")
      .type("form")
      .send({ username: "gina@example.com", password: TEST_PASSWORD });

    expect(res.status).toBe(200);
    expect(res.body.data.token_type).toBe("bearer");
  });

  it("POST /api/auth/login with a wrong password or unknown email -> 401", async () => {
    const app = makeApp();
    await seedUser({ email: "hank@example.com" });

    const wrong = await request(app).post("/api/auth/login").send({ email: "hank@example.com", password: "nope" });
    const unknown = await request(app).post("/api/auth/login").send({ email: "who@example.com", password: "nope" });

    for (const res of [wrong, unknown]) {
      expect(res.status).toBe(401);
      expect(res.body).toEqual({
        success: false,
        error: "Invalid email or password",
        code: "AUTHENTICATION_ERROR",
      });
    }
  });

  it("POST /api/auth/login on an unconfirmed account -> 403", async () => {
    const app = makeApp();
    await seedUser({ email: "ivy@example.com", confirmed: false });

    const res = await request(app).post("/api/auth/login").send({ email: "ivy@example.com", password: TEST_PASSWORD });

    expect(res.status).toBe(403);
    expect(res.body).toEqual({ success: false, error: "Email not confirmed", code: "AUTHORIZATION_ERROR" });
  });

  it("POST /api/auth/refresh_token rotates the token and detects reuse", async () => {
    const app = makeApp();
    const { user } = await seedUser({ email: "jack@example.com" });

    const login = await request(app).post("/api/auth/login").send({ email: "jack@example.com", password: TEST_PASSWORD });
    const first = String(login.body.data.refresh_token);

    const rotated = await request(app).post("/api/auth/refresh_token").send({ refresh_token: first });
    expect(rotated.status).toBe(200);
    const second = String(rotated.body.data.refresh_token);
    expect(second).not.toBe(first);

    const oldRow = [...store.refreshTokens.values()].find((t) => t.tokenHash === hashOpaqueToken(first));
    const newRow = [...store.refreshTokens.values()].find((t) => t.tokenHash === hashOpaqueToken(second));
    expect(oldRow?.revokedAt).toBeInstanceOf(Date);
    expect(oldRow?.replacedById).toBe(newRow?.id);

    // Presenting the rotated-out token again revokes the whole family.
    const reused = await request(app).post("/api/auth/refresh_token").send({ refresh_token: first });
    expect(reused.status).toBe(401);
    expect(reused.body.error).toBe("Invalid refresh token");

    const active = [...store.refreshTokens.values()].filter((t) => t.userId === user.id && !t.revokedAt);
    expect(active).toHaveLength(0);

    const afterReuse = await request(app).post("/api/auth/refresh_token").send({ refresh_token: second });
    expect(afterReuse.status).toBe(401);
  });

  it("POST /api/auth/refresh_token reads the token from a Bearer header", async () => {
    const app = makeApp();
    await seedUser({ email: "kate@example.com" });
    const login = await request(app).post("/api/auth/login").send({ email: "kate@example.com", password: TEST_PASSWORD });

    const res = await request(app)
      .post("/api/auth/refresh_token")
      .set("Authorization", `Bearer ${login.body.data.refresh_token}`);

    expect(res.status).toBe(200);
    expect(res.body.data.token_type).toBe("bearer");
  });

  it("POST /api/auth/refresh_token with an expired or missing token -> 401", async () => {
    const app = makeApp();
    await seedUser({ email: "liam@example.com" });
    const login = await request(app).post("/api/auth/login").send({ email: "liam@example.com", password: TEST_PASSWORD });
    for (const row of store.refreshTokens.values()) {
      row.expiresAt = new Date(Date.now() - 1000);
    }

    const expired = await request(app).post("/api/auth/refresh_token").send({ refresh_token: login.body.data.refresh_token });
    expect(expired.status).toBe(401);
    expect(expired.body.error).toBe("Refresh token expired");

    const missing = await request(app).post("/api/auth/refresh_token").send({});
    expect(missing.status).toBe(401);
    expect(missing.body.error).toBe("Missing refresh token");
  });

  it("POST /api/auth/logout revokes the refresh token and is idempotent", async () => {
    const app = makeApp();
    await seedUser({ email: "mia@example.com" });
    const login = await request(app).post("/api/auth/login").send({ email: "mia@example.com", password: TEST_PASSWORD });
    const token = String(login.body.data.refresh_token);

    const first = await request(app).post("/api/auth/logout").send({ refresh_token: token });
    expect(first.status).toBe(200);
    expect(first.body.data).toEqual({ logged_out: true });

    const again = await request(app).post("/api/auth/logout").send({ refresh_token: token });
    expect(again.status).toBe(200);

    const refreshed = await request(app).post("/api/auth/refresh_token").send({ refresh_token: token });
    expect(refreshed.status).toBe(401);
  });
});

describe("Auth: password reset", () => {
  beforeEach(() => {
    resetStore();
    __resetMailForTests();
  });

  async function requestReset(app: ReturnType<typeof makeApp>, email: string): Promise<string> {
    const sent = __getMailOutboxForTests().length;
    const res = await request(app).post("/api/auth/forgot_password").send({ email });
    expect(res.status).toBe(202);
    expect(res.body.data).toEqual({ message: "Check your email for reset password." });
    const mail = await waitForMail(sent + 1);
    expect(mail?.subject).toBe("Reset password");
    return tokenFromLink(mail?.text ?? "", "reset_password");
  }

  it("POST /api/auth/forgot_password answers 202 for unknown emails without sending mail", async () => {
    const app = makeApp();

    const res = await request(app).post("/api/auth/forgot_password").send({ email: "ghost@example.com" });

    expect(res.status).toBe(202);
    expect(res.body.data).toEqual({ message: "Check your email for reset password." });
    expect(__getMailOutboxForTests()).toHaveLength(0);
  });

  it("GET /api/auth/reset_password/:token renders the form", async () => {
    const app = makeApp();
    await seedUser({ username: "nora", email: "nora@example.com" });
    const token = await requestReset(app, "nora@example.com");

    const res = await request(app).get(`/api/auth/reset_password/${token}`);

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toContain("text/html");
    expect(res.text).toContain("Hi nora, choose a new password.");
    expect(res.text).toContain(`action="/api/auth/reset_password/${token}"`);
  });

  it("POST /api/auth/reset_password/:token sets the password once and ends sessions", async () => {
    const app = makeApp();
    const { user } = await seedUser({ email: "owen@example.com" });
    const login = await request(app).post("/api/auth/login").send({ email: "owen@example.com", password: TEST_PASSWORD });
    const token = await requestReset(app, "owen@example.com");

    const res = await request(app)
      .post(`/api/auth/reset_password/${token}`)
      .send({ password: "new-secret", confirm_password: "new-secret" });

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ message: "Password reset successfully" });
    expect(await verifyPassword("new-secret", store.users.get(user.id)?.passwordHash ?? "")).toBe(true);

    const refreshed = await request(app)
      .post("/api/auth/refresh_token")
      .send({ refresh_token: login.body.data.refresh_token });
    expect(refreshed.status).toBe(401);

    const reused = await request(app)
      .post(`/api/auth/reset_password/${token}`)
      .send({ password: "other-secret", confirm_password: "other-secret" });
    expect(reused.status).toBe(400);
    expect(reused.body).toEqual({ success: false, error: "Invalid or expired reset token", code: "BAD_REQUEST" });

    const relogin = await request(app).post("/api/auth/login").send({ email: "owen@example.com", password: "new-secret" });
    expect(relogin.status).toBe(200);
  });

  it("POST /api/auth/reset_password/:token accepts the form post", async () => {
    const app = makeApp();
    await seedUser({ email: "pat@example.com" });
    const token = await requestReset(app, "pat@example.com");

    const res = await request(app)
      .post(`/api/auth/reset_password/${token}`)
      .type("form")
      .send({ password: "form-secret", confirm_password: "form-secret" });

    expect(res.status).toBe(200);
  });

  it("POST /api/auth/reset_password/:token with mismatching passwords -> 422", async () => {
    const app = makeApp();
    await seedUser({ email: "quinn@example.com" });
    const token = await requestReset(app, "quinn@example.com");

    const res = await request(app)
      .post(`/api/auth/reset_password/${token}`)
      .send({ password: "new-secret", confirm_password: "different" });

    expect(res.status).toBe(422);
    expect(res.body.error).toBe("Validation error: confirm_password: Passwords do not match");
  });

  it("only the newest reset link works, and expired links are rejected", async () => {
    const app = makeApp();
    await seedUser({ email: "rita@example.com" });
    const older = await requestReset(app, "rita@example.com");
    const newer = await requestReset(app, "rita@example.com");

    const stale = await request(app).get(`/api/auth/reset_password/${older}`);
    expect(stale.status).toBe(400);

    for (const row of store.userTokens.values()) {
      row.expiresAt = new Date(Date.now() - 1000);
    }
    const expired = await request(app)
      .post(`/api/auth/reset_password/${newer}`)
      .send({ password: "new-secret", confirm_password: "new-secret" });
    expect(expired.status).toBe(400);
  });
});
