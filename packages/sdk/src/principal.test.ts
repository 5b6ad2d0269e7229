import { describe, it, expect } from "vitest";
import {
  byId,
  byName,
  formatPrincipalRef,
  isIdentifierForm,
  parsePrincipalRef,
  refersTo,
} from "./principal.js";

const ID = "0F8FAD5B-D9CB-469F-A165-70867728950E";

describe("principal references", () => {
  it("should recognise canonical identifiers in either case", () => {
    expect(isIdentifierForm(ID)).toBe(true);
    expect(isIdentifierForm(ID.toLowerCase())).toBe(true);
    expect(isIdentifierForm("Steve")).toBe(false);
    expect(isIdentifierForm("0f8fad5bd9cb469fa16570867728950e")).toBe(false);
  });

  it("should parse raw strings into tagged references", () => {
    expect(parsePrincipalRef(ID)).toEqual({ kind: "id", id: ID.toLowerCase() });
    expect(parsePrincipalRef("Steve")).toEqual({ kind: "name", name: "Steve" });
  });

  it("should format references back to their raw form", () => {
    expect(formatPrincipalRef(byId(ID))).toBe(ID.toLowerCase());
    expect(formatPrincipalRef(byName("Steve"))).toBe("Steve");
  });

  it("should only match identifier references", () => {
    expect(refersTo(byId(ID), ID.toLowerCase())).toBe(true);
    expect(refersTo(byName(ID), ID)).toBe(false);
  });
});
