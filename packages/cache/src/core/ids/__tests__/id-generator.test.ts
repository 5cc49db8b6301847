import { idGeneratorFor, uuidV4, uuidV7 } from "../id-generator"

const uuidPattern = /^[0-9a-f]{8}-[0-9a-f]{4}-([47])[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

describe("id generators", () => {
  it("produces v4 uuids", () => {
    expect(uuidV4.generate()).toMatch(uuidPattern)
    expect(uuidPattern.exec(uuidV4.generate())?.[1]).toBe("4")
  })

  it("produces v7 uuids", () => {
    expect(uuidPattern.exec(uuidV7.generate())?.[1]).toBe("7")
  })

  it("does not repeat", () => {
    const ids = new Set(Array.from({ length: 100 }, () => uuidV4.generate()))

    expect(ids.size).toBe(100)
  })

  it("maps each token format to its generator", () => {
    expect(idGeneratorFor("uuid-v4")).toBe(uuidV4)
    expect(idGeneratorFor("uuid-v7")).toBe(uuidV7)
  })
})
