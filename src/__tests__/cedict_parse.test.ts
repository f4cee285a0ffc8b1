import fs from "fs";
import { describe, expect, it } from "vitest";
import { parseCedict, pickGloss } from "../cedict_parse.js";
import { MissingSourceError } from "../errors.js";

const sample = fs.readFileSync(new URL("./fixtures/cedict.txt", import.meta.url), "utf8");

describe("pickGloss", () => {
  it("skips surname, variant and classifier notes", () => {
    expect(pickGloss(["surname Jing", "Beijing"])).toBe("Beijing");
    expect(pickGloss(["variant of 著[zhu4]", "to write"])).toBe("to write");
    expect(pickGloss(["CL:本[ben3]", "book"])).toBe("book");
  });

  it("removes bracketed notes and cuts at the first semicolon", () => {
    expect(pickGloss(["to go (to a place); to leave"])).toBe("to go");
    expect(pickGloss(["bristle radical (Kangxi radical 59)"])).toBe("bristle radical");
  });
});

describe("parseCedict", () => {
  const { records, issues } = parseCedict(sample);
  const byChar = new Map(records.map((r) => [r.character, r]));

  it("keeps single-character headwords only", () => {
    expect(records.map((r) => r.character)).toEqual(["明", "日", "月", "影", "京", "彡", "木", "汉", "漢"]);
  });

  it("records keyword, reading and definitions", () => {
    expect(byChar.get("京")).toEqual({
      tier: "tertiary",
      character: "京",
      keyword: "Beijing",
      components: [],
      reading: "jing1",
      definitions: ["surname Jing", "Beijing", "capital city of a country", "big"],
    });
    expect(byChar.get("月")?.keyword).toBe("moon");
  });

  it("gives the traditional form its own record", () => {
    expect(byChar.get("漢")?.keyword).toBe("Han ethnic group");
    expect(byChar.get("汉")?.definitions).toEqual(["Han ethnic group", "Chinese (language)"]);
  });

  it("reports lines outside the format", () => {
    expect(issues).toEqual([
      { kind: "malformed-record", at: "line 11", detail: "not a 'trad simp [pinyin] /defs/' line" },
    ]);
  });

  it("rejects text with no dictionary lines", () => {
    expect(() => parseCedict("hello world\n")).toThrow(MissingSourceError);
  });
});
