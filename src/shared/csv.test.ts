import { describe, expect, it } from "vitest";
import { escapeCsvField, toCsv } from "./csv.js";
import type { SmartFactRecord } from "./record.js";

const HEADER =
  "ID,Status,Type,Kind,Priority,Content,Dynamic Variables,CTA Text,CTA URL,Required Context," +
  "Requires Primary User,Requires Profile Complete,Has CTA";

describe("escapeCsvField", () => {
  it("quotes fields with commas, quotes or newlines", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a, b")).toBe('"a, b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("two\nlines")).toBe('"two\nlines"');
  });
});

describe("toCsv", () => {
  it("writes only the header for no records", () => {
    expect(toCsv([])).toBe(HEADER);
  });

  it("writes one row per record", () => {
    const record: SmartFactRecord = {
      id: "SF-1",
      status: "published",
      type: "home-equity",
      content: "Worth {home_value},\ntoday",
      priority: 2,
      templateKeys: ["home_value"],
      isDynamic: true,
      cta: { text: "See options", url: "https://example.com/equity" },
      hasCta: true,
      requiredContext: ["SYSTEM", "HOME"],
      requiresPrimaryUser: true,
      requiresProfileComplete: false
    };
    expect(toCsv([record]).split("\n")).toEqual([
      HEADER,
      'SF-1,published,home-equity,Dynamic,2,"Worth {home_value}, today",home_value,See options,' +
        "https://example.com/equity,SYSTEM; HOME,Yes,No,Yes"
    ]);
  });
});
