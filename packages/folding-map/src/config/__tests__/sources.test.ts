import { FoldingMap } from "../../core/folding-map"
import { EnvSource } from "../sources/env-source"
import { ObjectSource } from "../sources/object-source"

describe("EnvSource", () => {
  it("keeps prefixed variables with the prefix stripped", async () => {
    const source = new EnvSource({
      env: { KEYFOLD_RETENTION: "canonical", HOME: "/root", KEYFOLD: "bare" },
    })

    await expect(source.load()).resolves.toEqual({ RETENTION: "canonical" })
    expect(source.name).toBe("env")
  })

  it("matches the prefix in any case", async () => {
    const source = new EnvSource({ env: { keyfold_normalizer: "exact" } })

    await expect(source.load()).resolves.toEqual({ normalizer: "exact" })
  })

  it("accepts a custom prefix and name", async () => {
    const source = new EnvSource({
      prefix: "app_fold_",
      name: "env:app",
      env: { APP_FOLD_NORMALIZER: "exact", KEYFOLD_RETENTION: "canonical" },
    })

    await expect(source.load()).resolves.toEqual({ NORMALIZER: "exact" })
    expect(source.name).toBe("env:app")
  })

  it("trims values and treats blank ones as unset", async () => {
    const source = new EnvSource({
      env: { KEYFOLD_RETENTION: "  most-recent\n", KEYFOLD_NORMALIZER: "   ", KEYFOLD_X: undefined },
    })

    await expect(source.load()).resolves.toEqual({ RETENTION: "most-recent" })
  })
})

describe("ObjectSource", () => {
  it("returns a copy of a plain object", async () => {
    const overrides = { retention: "canonical" }
    const source = new ObjectSource(overrides)

    const loaded = await source.load()

    expect(loaded).toEqual(overrides)
    expect(loaded).not.toBe(overrides)
    expect(source.name).toBe("object:overrides")
  })

  it("reads entries from a Map", async () => {
    const source = new ObjectSource(
      new Map<string, unknown>([
        ["retention", "canonical"],
        ["normalizer", "exact"],
      ]),
    )

    await expect(source.load()).resolves.toEqual({ retention: "canonical", normalizer: "exact" })
  })

  it("reads a FoldingMap under its preserved keys", async () => {
    const settings = FoldingMap.fromObject<unknown>({ Retention: "canonical" })
    settings.set("RETENTION", "most-recent")

    await expect(new ObjectSource(settings).load()).resolves.toEqual({
      Retention: "most-recent",
    })
  })

  it("snapshots the values when loaded", async () => {
    const settings = new Map<string, unknown>([["retention", "canonical"]])
    const source = new ObjectSource(settings)

    const loaded = await source.load()
    settings.set("retention", "most-recent")

    expect(loaded).toEqual({ retention: "canonical" })
  })

  it("reports a custom name", () => {
    expect(new ObjectSource({}, { name: "object:cli" }).name).toBe("object:cli")
  })
})
