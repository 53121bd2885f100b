import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ExternalApiError } from "../src/shared/errors.js";
import { __setMediaHostForTests, type MediaHost, type UploadImageParams } from "../src/shared/media.js";
import { resetStore, store } from "./fakes/store.js";
import { makeApp } from "./test-app.js";
import { seedUser } from "./test-auth.js";

vi.mock("../src/modules/users/users.repository.js", () => import("./fakes/users.repository.js"));

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function recordingHost(url: string): MediaHost & { calls: UploadImageParams[] } {
  const calls: UploadImageParams[] = [];
  return {
    calls,
    async uploadAvatar(params) {
      calls.push(params);
      return { url };
    },
  };
}

describe("Users", () => {
  beforeEach(() => {
    resetStore();
  });

  afterEach(() => {
    __setMediaHostForTests(null);
  });

  it("GET /api/users/me returns the profile without secrets", async () => {
    const app = makeApp();
    const { user, accessToken } = await seedUser({ username: "sam", email: "sam@example.com" });

    const res = await request(app).get("/api/users/me").set("Authorization", `Bearer ${accessToken}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: true,
      data: {
        id: user.id,
        username: "sam",
        email: "sam@example.com",
        avatar: null,
        confirmed: true,
        created_at: user.createdAt.toISOString(),
      },
    });
  });

  it("GET /api/users/me for a deleted account -> 401", async () => {
    const app = makeApp();
    const { user, accessToken } = await seedUser();
    store.users.delete(user.id);

    const res = await request(app).get("/api/users/me").set("Authorization", `Bearer ${accessToken}`);

    expect(res.status).toBe(401);
  });

  it("PATCH /api/users/avatar uploads under the user's public id and stores the URL", async () => {
    const app = makeApp();
    const host = recordingHost("https://media.test/ContactsApp/tess.png");
    __setMediaHostForTests(host);
    const { user, accessToken } = await seedUser({ username: "tess" });

    const res = await request(app)
      .patch("/api/users/avatar")
      .set("Authorization", `Bearer ${accessToken}`)
      .attach("file", PNG_BYTES, { filename: "me.png", contentType: "image/png" });

    expect(res.status).toBe(200);
    expect(res.body.data.avatar).toBe("https://media.test/ContactsApp/tess.png");
    expect(host.calls).toHaveLength(1);
    expect(host.calls[0]?.publicId).toBe(`ContactsApp/user-${user.id}`);
    expect(host.calls[0]?.buffer.equals(PNG_BYTES)).toBe(true);
    expect(store.users.get(user.id)?.avatar).toBe("https://media.test/ContactsApp/tess.png");
  });

  it("PATCH /api/users/avatar keeps users who share a username apart", async () => {
    const app = makeApp();
    const host = recordingHost("https://media.test/avatar.png");
    __setMediaHostForTests(host);
    const first = await seedUser({ username: "sam" });
    const second = await seedUser({ username: "sam" });

    for (const { accessToken } of [first, second]) {
      await request(app)
        .patch("/api/users/avatar")
        .set("Authorization", `Bearer ${accessToken}`)
        .attach("file", PNG_BYTES, { filename: "me.png", contentType: "image/png" })
        .expect(200);
    }

    expect(host.calls.map((call) => call.publicId)).toEqual([
      `ContactsApp/user-${first.user.id}`,
      `ContactsApp/user-${second.user.id}`,
    ]);
  });

  it("PATCH /api/users/avatar rejects non-images and missing files with 422", async () => {
    const app = makeApp();
    __setMediaHostForTests(recordingHost("https://media.test/unused.png"));
    const { accessToken } = await seedUser();

    const text = await request(app)
      .patch("/api/users/avatar")
      .set("Authorization", `Bearer ${accessToken}`)
      .attach("file", Buffer.from("hello"), { filename: "notes.txt", contentType: "text/plain" });
    expect(text.status).toBe(422);
    expect(text.body).toEqual({ success: false, error: "Avatar must be an image", code: "VALIDATION_ERROR" });

    const missing = await request(app)
      .patch("/api/users/avatar")
      .set("Authorization", `Bearer ${accessToken}`)
      .field("note", "no file");
    expect(missing.status).toBe(422);
    expect(missing.body.error).toBe("Validation error: file: Required");
  });

  it("PATCH /api/users/avatar maps media host failures to 502", async () => {
    const app = makeApp();
    __setMediaHostForTests({
      uploadAvatar: () => Promise.reject(new ExternalApiError("Cloudinary", "upload rejected")),
    });
    const { accessToken } = await seedUser();

    const res = await request(app)
      .patch("/api/users/avatar")
      .set("Authorization", `Bearer ${accessToken}`)
      .attach("file", PNG_BYTES, { filename: "me.png", contentType: "image/png" });

    expect(res.status).toBe(502);
    expect(res.body).toEqual({
      success: false,
      error: "Cloudinary API error: upload rejected",
      code: "EXTERNAL_API_ERROR",
    });
  });

  it("PATCH /api/users/avatar without media host credentials -> 500 CONFIGURATION_ERROR", async () => {
    const app = makeApp();
    const { accessToken } = await seedUser();

    const res = await request(app)
      .patch("/api/users/avatar")
      .set("Authorization", `Bearer ${accessToken}`)
      .attach("file", PNG_BYTES, { filename: "me.png", contentType: "image/png" });

    expect(res.status).toBe(500);
    expect(res.body.code).toBe("CONFIGURATION_ERROR");
  });
});
