import { describe, expect, it } from "@effect/vitest"

import { fieldNamesScript, readFieldScript } from "../../src/shell/services/status-oracle.js"

describe("status query scripts", () => {
  it("escapes single quotes in folder and item names", () => {
    const script = readFieldScript("D:\\Sync\\o'neil", "it's.txt", 303)
    expect(script).toContain("Namespace('D:\\Sync\\o''neil')")
    expect(script).toContain("ParseName('it''s.txt')")
    expect(script.endsWith("$folder.GetDetailsOf($item, 303)")).toBe(true)
  })

  it("reads header names up to the scan limit", () => {
    const script = fieldNamesScript("D:\\Sync", 320)
    expect(script).toContain("if ($null -eq $folder) { exit 2 }")
    expect(script.endsWith("for ($i = 0; $i -lt 320; $i++) { $folder.GetDetailsOf($null, $i) }")).toBe(true)
  })
})
