/**
 * Unit tests for the annotated capability.
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Annotated from "./Annotated.js"

describe("Annotated", () => {
  it("should start without a bag by default", () => {
    expect(Annotated.make().getAnnotations()).toBeUndefined()
  })

  it("should not expose its bag to outside mutation", () => {
    const initial: Record<string, string> = { owner: "team-a" }
    const object = Annotated.make(initial)

    initial.owner = "team-b"
    const read: Record<string, string> = { ...object.getAnnotations() }
    read.owner = "team-c"

    expect(object.getAnnotations()).toEqual({ owner: "team-a" })
  })

  it("should replace the bag on set", () => {
    const object = Annotated.make({ owner: "team-a" })

    object.setAnnotations({ tier: "gold" })

    expect(object.getAnnotations()).toEqual({ tier: "gold" })
  })

  it("should recognize annotated objects", () => {
    expect(Annotated.isAnnotated(Annotated.make())).toBe(true)
    expect(Annotated.isAnnotated({ getAnnotations: () => undefined })).toBe(false)
    expect(Annotated.isAnnotated(null)).toBe(false)
  })
})
