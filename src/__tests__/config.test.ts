import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  createElasticProperties,
  createLinearExtent,
  DEFAULT_ELASTIC_PROPERTIES,
  parseElasticProperties,
  parseLinearExtent,
} from "../core/config.ts";

describe("config", () => {
  describe("createElasticProperties", () => {
    it("returns the defaults without overrides", () => {
      expect(createElasticProperties()).toEqual(DEFAULT_ELASTIC_PROPERTIES);
    });

    it("merges overrides onto the defaults", () => {
      const props = createElasticProperties({ handK: 12, drag: 0 });
      expect(props.handK).toBe(12);
      expect(props.drag).toBe(0);
      expect(props.mass).toBe(DEFAULT_ELASTIC_PROPERTIES.mass);
    });

    it("rejects invalid overrides", () => {
      expect(() => createElasticProperties({ mass: -1 })).toThrow(ConfigurationError);
    });
  });

  describe("parseElasticProperties", () => {
    it("accepts a complete document", () => {
      const input = { mass: 2, handK: 1, endK: 2, snapK: 3, snapRadius: 0.5, drag: 0.1 };
      expect(parseElasticProperties(input)).toEqual(input);
    });

    it("reports one issue per bad field", () => {
      try {
        parseElasticProperties({ mass: 0, handK: "stiff", endK: 1, snapK: 1, snapRadius: Infinity, drag: 0 });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(ConfigurationError);
        if (!(e instanceof ConfigurationError)) return;
        expect(e.issues.map((issue) => issue.split(":")[0])).toEqual(["properties.mass", "properties.handK", "properties.snapRadius"]);
        expect(e.message.startsWith("Invalid elastic configuration: properties.mass")).toBe(true);
      }
    });

    it("reports missing fields", () => {
      expect(() => parseElasticProperties({ mass: 1 })).toThrow(/properties\.handK/);
    });
  });

  describe("linear extents", () => {
    it("defaults snap points to none", () => {
      expect(parseLinearExtent({ minStretch: -1, maxStretch: 1, snapToEnd: true })).toEqual({
        minStretch: -1,
        maxStretch: 1,
        snapToEnd: true,
        snapPoints: [],
      });
    });

    it("rejects non-numeric snap points", () => {
      expect(() => parseLinearExtent({ minStretch: 0, maxStretch: 1, snapToEnd: false, snapPoints: [0.5, "x"] })).toThrow(/extent\.snapPoints\.1/);
    });

    it("builds from the default extent", () => {
      expect(createLinearExtent({ snapPoints: [0.25] })).toEqual({ minStretch: 0, maxStretch: 1, snapToEnd: false, snapPoints: [0.25] });
    });
  });
});
