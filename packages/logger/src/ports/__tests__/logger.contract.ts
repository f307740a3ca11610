import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() carries the parent context into its entries", () => {
      const { logger, read } = h.make({ level: "trace" })

      const scoped = logger.child({ module: "options-resolver" })
      const tenantScoped = scoped.child({ tenantId: "tenant-a" })

      tenantScoped.info("resolved")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        module: "options-resolver",
        tenantId: "tenant-a",
      })
    })

    it("child() overrides the parent on key conflict", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ tenantId: "tenant-a" }).child({ tenantId: "tenant-b" })

      child.info("resolved")

      expect(read()[0]?.payload.tenantId).toBe("tenant-b")
    })

    it("child() leaves the parent untouched", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "options-cache" })
      const child = parent.child({ tenantId: "tenant-a" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("tenantId")
      expect(logs[1]?.payload).toMatchObject({
        module: "options-cache",
        tenantId: "tenant-a",
      })
    })

    it("per-call meta is merged into the entry", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ tenantId: "tenant-a" }).debug("cache miss", {
        optionsType: "BillingOptions",
        optionsName: "",
      })

      expect(read()[0]?.payload).toMatchObject({
        tenantId: "tenant-a",
        optionsType: "BillingOptions",
        optionsName: "",
      })
    })

    it("entries below the configured level are dropped", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")
      logger.fatal("fatal")

      expect(read().map((l) => l.level)).toEqual(["warn", "error", "fatal"])
    })

    it("clear() empties the captured entries", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      logger.info("one")
      clear()
      logger.info("two")

      expect(read()).toHaveLength(1)
    })
  })
}
