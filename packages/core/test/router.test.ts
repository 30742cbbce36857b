import { describe, expect, it } from "vitest"

import { BackendRouter } from "../src/features/routing/router.js"
import { FakeBackend } from "./helpers.js"

describe("BackendRouter", () => {
  it("uses the preferred backend when it is available", async () => {
    const router = new BackendRouter([new FakeBackend({ name: "a" }), new FakeBackend({ name: "b" })])
    expect(router.setPreferred("b")).toBe(true)

    const backend = await router.getActiveBackend()

    expect(backend.name).toBe("b")
  })

  it("falls back to the first available backend in registration order", async () => {
    const router = new BackendRouter([
      new FakeBackend({ name: "a", available: false }),
      new FakeBackend({ name: "b" }),
      new FakeBackend({ name: "c", available: false }),
      new FakeBackend({ name: "d" }),
    ])
    router.setPreferred("c")

    const backend = await router.getActiveBackend()

    expect(backend.name).toBe("b")
  })

  it("rejects with a 503 error when nothing is available", async () => {
    const router = new BackendRouter([new FakeBackend({ name: "a", available: false })])

    await expect(router.getActiveBackend()).rejects.toMatchObject({
      code: "NO_BACKEND_AVAILABLE",
      httpStatus: 503,
    })
  })

  it("rejects an empty registry", async () => {
    await expect(new BackendRouter().getActiveBackend()).rejects.toMatchObject({ code: "NO_BACKEND_AVAILABLE" })
  })

  it("refuses unknown preferred names and clears with null", () => {
    const router = new BackendRouter([new FakeBackend({ name: "a" })])

    expect(router.setPreferred("missing")).toBe(false)
    expect(router.preferred).toBeNull()

    router.setPreferred("a")
    expect(router.preferred).toBe("a")
    expect(router.setPreferred(null)).toBe(true)
    expect(router.preferred).toBeNull()
  })

  it("rejects duplicate registrations", () => {
    const router = new BackendRouter([new FakeBackend({ name: "a" })])

    expect(() => router.register(new FakeBackend({ name: "a" }))).toThrow("Backend already registered: a")
    expect(router.names).toEqual(["a"])
  })

  it("resolves against the registry as it was when resolution started", async () => {
    let releaseProbe: (available: boolean) => void = () => {}
    const slow = new FakeBackend({ name: "slow" })
    slow.isAvailable = () =>
      new Promise<boolean>((resolve) => {
        releaseProbe = resolve
      })
    const router = new BackendRouter([slow])

    const pending = router.getActiveBackend()
    router.register(new FakeBackend({ name: "late" }))
    releaseProbe(false)

    await expect(pending).rejects.toMatchObject({ code: "NO_BACKEND_AVAILABLE" })
    slow.isAvailable = async () => false
    await expect(router.getActiveBackend()).resolves.toMatchObject({ name: "late" })
  })

  it("treats a rejected availability check as unavailable", async () => {
    const broken = new FakeBackend({ name: "broken" })
    broken.isAvailable = async () => {
      throw new Error("socket hang up")
    }
    const router = new BackendRouter([broken, new FakeBackend({ name: "b", port: 2, resourceCost: 0 })])
    router.setPreferred("broken")

    await expect(router.getActiveBackend()).resolves.toMatchObject({ name: "b" })
    expect(await router.listBackends()).toEqual([
      { name: "broken", available: false, port: 9000, resource_cost: 1, active: false },
      { name: "b", available: true, port: 2, resource_cost: 0, active: true },
    ])
  })

  it("lists availability and marks the active backend", async () => {
    const router = new BackendRouter([
      new FakeBackend({ name: "a", available: false, port: 1, resourceCost: 3 }),
      new FakeBackend({ name: "b", port: 2, resourceCost: 0 }),
      new FakeBackend({ name: "c", port: 3, resourceCost: 8 }),
    ])
    router.setPreferred("c")

    const statuses = await router.listBackends()

    expect(statuses).toEqual([
      { name: "a", available: false, port: 1, resource_cost: 3, active: false },
      { name: "b", available: true, port: 2, resource_cost: 0, active: false },
      { name: "c", available: true, port: 3, resource_cost: 8, active: true },
    ])
  })
})
