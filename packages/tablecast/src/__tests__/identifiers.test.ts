import { describe, expect, it } from "@effect/vitest"
import {
  splitWords,
  toExportedIdentifier,
  toModuleIdentifier,
  toWrapperTypeName,
} from "../services/identifiers.js"

describe("splitWords", () => {
  it("splits on non-alphanumeric characters and capitalizes each word", () => {
    expect(splitWords("user_id")).toEqual(["User", "Id"])
    expect(splitWords("html-body 2")).toEqual(["Html", "Body", "2"])
  })

  it("keeps the casing inside a word", () => {
    expect(splitWords("customerId")).toEqual(["CustomerId"])
  })

  it("returns no words for separators only", () => {
    expect(splitWords("")).toEqual([])
    expect(splitWords("__--")).toEqual([])
  })
})

describe("toExportedIdentifier", () => {
  it("joins capitalized words", () => {
    expect(toExportedIdentifier("orders")).toBe("Orders")
    expect(toExportedIdentifier("order_items")).toBe("OrderItems")
    expect(toExportedIdentifier("created at")).toBe("CreatedAt")
  })

  it("applies force cases to whole words, ignoring case", () => {
    expect(toExportedIdentifier("user_id", ["ID"])).toBe("UserID")
    expect(toExportedIdentifier("html_id", ["HTML", "ID"])).toBe("HTMLID")
    expect(toExportedIdentifier("user_ids", ["ID"])).toBe("UserIds")
  })

  it("uses the first matching force case", () => {
    expect(toExportedIdentifier("user_id", ["Id", "ID"])).toBe("UserId")
  })

  it("prefixes identifiers that don't start with an upper-case letter", () => {
    expect(toExportedIdentifier("2fa")).toBe("E2fa")
    expect(toExportedIdentifier("")).toBe("E")
    expect(toExportedIdentifier("__")).toBe("E")
  })

  it("prefixes when a force case makes the first word lower-case", () => {
    expect(toExportedIdentifier("id", ["id"])).toBe("Eid")
  })

  it("drops number forms that are not decimal digits", () => {
    expect(toExportedIdentifier("area_m²")).toBe("AreaM")
    expect(toExportedIdentifier("½_price")).toBe("Price")
    expect(toExportedIdentifier("²")).toBe("E")
  })

  it("handles non-ASCII letters", () => {
    expect(toExportedIdentifier("über_straße")).toBe("ÜberStraße")
  })

  it("leaves its own output unchanged", () => {
    expect(toExportedIdentifier("UserId")).toBe("UserId")
    expect(toExportedIdentifier(toExportedIdentifier("order_items"))).toBe("OrderItems")
  })

  it("is deterministic", () => {
    expect(toExportedIdentifier("line_items", ["ID"])).toBe(toExportedIdentifier("line_items", ["ID"]))
  })
})

describe("toModuleIdentifier", () => {
  it("keeps valid identifiers", () => {
    expect(toModuleIdentifier("shop")).toBe("shop")
    expect(toModuleIdentifier("shop_v2")).toBe("shop_v2")
  })

  it("replaces non-word characters with underscores", () => {
    expect(toModuleIdentifier("my-db.v2")).toBe("my_db_v2")
    expect(toModuleIdentifier("café")).toBe("caf_")
  })

  it("prefixes an underscore when empty or starting with a digit", () => {
    expect(toModuleIdentifier("2024data")).toBe("_2024data")
    expect(toModuleIdentifier("")).toBe("_")
  })
})

describe("toWrapperTypeName", () => {
  it("combines the lower-cased raw type, class and field names", () => {
    expect(toWrapperTypeName("VARCHAR", "Orders", "Status")).toBe("varchar_Orders_Status")
  })

  it("replaces characters that can't appear in an identifier", () => {
    expect(toWrapperTypeName("double precision", "Orders", "Total")).toBe("double_precision_Orders_Total")
  })

  it("replaces number forms that are not decimal digits", () => {
    expect(toWrapperTypeName("point²", "Plots", "Area")).toBe("point__Plots_Area")
  })
})
