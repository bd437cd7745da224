import { describe, expect, it } from "vitest";
import { loadConfig } from "../config/env.js";
import { FacebookAdapter } from "./facebook.js";
import { createAdapters } from "./index.js";

describe("createAdapters", () => {
  it("builds adapters only for configured platforms", () => {
    const adapters = createAdapters(
      loadConfig({
        TWITTER_ACCESS_TOKEN: "test-token",
        FACEBOOK_PAGE_ID: "1234",
        FACEBOOK_ACCESS_TOKEN: "test-page-token"
      })
    );

    expect([...adapters.keys()]).toEqual(["twitter", "facebook"]);
    expect(adapters.get("facebook")).toBeInstanceOf(FacebookAdapter);
    expect(adapters.has("instagram")).toBe(false);
  });

  it("is empty without credentials", () => {
    expect(createAdapters(loadConfig({})).size).toBe(0);
  });
});
