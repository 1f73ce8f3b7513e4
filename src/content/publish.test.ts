import { describe, expect, test } from "vitest";
import { publicationDate, publishState } from "./publish";

const now = new Date("2025-06-01T00:00:00Z");
const defaults = { buildDrafts: false, buildFuture: false, buildExpired: false };

describe("publishState", () => {
  test("drafts are skipped before anything else", () => {
    expect(publishState({ draft: true, date: "2999-01-01" }, defaults, now)).toBe("draft");
    expect(publishState({ draft: true }, { ...defaults, buildDrafts: true }, now)).toBe("published");
    expect(publishState({ draft: "true", date: "2024-01-01" }, defaults, now)).toBe("published");
  });

  test("future pages wait for their publication date", () => {
    expect(publishState({ date: "2999-01-01" }, defaults, now)).toBe("future");
    expect(publishState({ date: "2999-01-01" }, { ...defaults, buildFuture: true }, now)).toBe("published");
    expect(publishState({ date: "2024-01-01", publishDate: "2025-07-01" }, defaults, now)).toBe("future");
  });

  test("pages expire at their expiry date", () => {
    expect(publishState({ date: "2024-01-01", expiryDate: "2025-06-01" }, defaults, now)).toBe("expired");
    expect(publishState({ date: "2024-01-01", expiryDate: "2025-06-02" }, defaults, now)).toBe("published");
    expect(
      publishState({ date: "2024-01-01", expiryDate: "2025-01-01" }, { ...defaults, buildExpired: true }, now)
    ).toBe("published");
  });

  test("unreadable dates do not hold a page back", () => {
    expect(publishState({ date: "next week" }, defaults, now)).toBe("published");
  });
});

describe("publicationDate", () => {
  test("prefers publishDate over date", () => {
    expect(publicationDate({ date: "2024-01-01", publishDate: "2024-02-01" })?.toISOString()).toBe(
      "2024-02-01T00:00:00.000Z"
    );
    expect(publicationDate({ date: "2024-01-01", publishDate: "soon" })?.toISOString()).toBe(
      "2024-01-01T00:00:00.000Z"
    );
    expect(publicationDate({ date: "nope" })).toBeNull();
  });
});
