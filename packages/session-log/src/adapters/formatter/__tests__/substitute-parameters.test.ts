import { renderValue, substituteParameters } from "../substitute-parameters"

describe("substituteParameters", () => {
  it("replaces placeholders by index", () => {
    expect(substituteParameters("Deploying {0} to {1}", ["orders", "server-1"])).toBe(
      "Deploying orders to server-1",
    )
  })

  it("replaces repeated and reordered placeholders", () => {
    expect(substituteParameters("{1} then {0} then {1}", ["a", "b"])).toBe("b then a then b")
  })

  it("leaves placeholders without a parameter as written", () => {
    expect(substituteParameters("{0} and {2}", ["a"])).toBe("a and {2}")
  })

  it("returns the message unchanged when it has no {0", () => {
    expect(substituteParameters("value {1}", ["x", "y"])).toBe("value {1}")
  })

  it("substitutes null-prototype objects", () => {
    expect(substituteParameters("row {0}", [Object.create(null)])).toBe("row [object Object]")
  })

  it("returns the message unchanged without parameters", () => {
    expect(substituteParameters("{0}", [])).toBe("{0}")
    expect(substituteParameters("{0}")).toBe("{0}")
  })
})

describe("renderValue", () => {
  it("renders null as null", () => {
    expect(renderValue(null)).toBe("null")
  })

  it("renders dates as ISO strings", () => {
    expect(renderValue(new Date(Date.UTC(2024, 1, 29, 12, 0, 0, 0)))).toBe(
      "2024-02-29T12:00:00.000Z",
    )
  })

  it("renders other values with String()", () => {
    expect(renderValue(42)).toBe("42")
    expect(renderValue(false)).toBe("false")
    expect(renderValue(undefined)).toBe("undefined")
    expect(renderValue(10n)).toBe("10")
  })

  it("renders values without a string conversion by their tag", () => {
    const throwing = {
      toString() {
        throw new Error("no text")
      },
    }

    expect(renderValue(Object.create(null))).toBe("[object Object]")
    expect(renderValue(throwing)).toBe("[object Object]")
  })

  it("renders invalid dates without throwing", () => {
    expect(renderValue(new Date(Number.NaN))).toBe("Invalid Date")
  })
})
