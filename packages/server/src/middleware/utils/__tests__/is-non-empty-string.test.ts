import { isNonEmptyString } from "../is-non-empty-string"

describe("isNonEmptyString", () => {
  it.each([
    ["text", true],
    [" padded ", true],
    ["", false],
    ["  \t", false],
    [undefined, false],
    [42, false],
  ])("%j -> %s", (value, expected) => {
    expect(isNonEmptyString(value)).toBe(expected)
  })
})
