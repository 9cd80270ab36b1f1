import { describe, expect, it } from "vitest";
import { decodeAction, encodeAction } from "../src/actions.js";

describe("decodeAction", () => {
  it("decodes bare menu actions", () => {
    expect(decodeAction("main_menu")).toEqual({ type: "main_menu" });
    expect(decodeAction("post_ad")).toEqual({ type: "post_ad" });
    expect(decodeAction("search_by_area")).toEqual({ type: "search_by_area" });
  });

  it("decodes prefixed actions", () => {
    expect(decodeAction("area:north")).toEqual({ type: "area", area: "north" });
    expect(decodeAction("area_filter:south")).toEqual({ type: "area_filter", area: "south" });
    expect(decodeAction("field:capacity")).toEqual({ type: "field", field: "capacity" });
    expect(decodeAction("value:center")).toEqual({ type: "value", value: "center" });
    expect(decodeAction("edit:12")).toEqual({ type: "edit", adId: 12 });
    expect(decodeAction("delete:7")).toEqual({ type: "delete", adId: 7 });
    expect(decodeAction("report:3")).toEqual({ type: "report", adId: 3 });
  });

  it("rejects malformed payloads", () => {
    expect(decodeAction("area:east")).toBeNull();
    expect(decodeAction("field:user_id")).toBeNull();
    expect(decodeAction("delete:abc")).toBeNull();
    expect(decodeAction("report:")).toBeNull();
    expect(decodeAction("value:")).toBeNull();
    expect(decodeAction("edit:-1")).toBeNull();
    expect(decodeAction("m:stats")).toBeNull();
    expect(decodeAction("")).toBeNull();
  });
});

describe("encodeAction", () => {
  it("produces the payloads decodeAction reads", () => {
    expect(encodeAction({ type: "my_ads" })).toBe("my_ads");
    expect(encodeAction({ type: "edit", adId: 5 })).toBe("edit:5");
    expect(encodeAction({ type: "area_filter", area: "other" })).toBe("area_filter:other");
    expect(decodeAction(encodeAction({ type: "field", field: "date" }))).toEqual({ type: "field", field: "date" });
  });
});
