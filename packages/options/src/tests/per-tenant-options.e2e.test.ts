import { Writable } from "node:stream"
import { AsyncTenantContext } from "../adapters/context/async-tenant-context"
import { MultiTenantBuilder } from "../core/builder/multi-tenant-builder"
import { isOptionsError } from "../core/errors/options-error"
import { createLoggerFromSettings } from "../core/settings/create-logger"
import { loadSettings } from "../core/settings/load-settings"
import type { TenantStore } from "../ports/tenant-store"
import type { TenantStrategy } from "../ports/tenant-strategy"
import { type AppTenant, BillingOptions, deferred, tenantA, tenantB } from "./fixtures"

type Request = { headers: Record<string, string> }

class HeaderStrategy implements TenantStrategy<Request> {
  async identify(request: Request): Promise<string | undefined> {
    return request.headers["x-tenant"]
  }
}

class MapStore implements TenantStore<AppTenant> {
  constructor(private readonly tenants: Map<string, AppTenant>) {}

  async findByIdentifier(identifier: string): Promise<AppTenant | undefined> {
    return this.tenants.get(identifier)
  }
}

describe("per-tenant options end to end", () => {
  const records = new Map<string, AppTenant>([
    [tenantA.identifier, tenantA],
    [tenantB.identifier, tenantB],
  ])

  async function setup() {
    const lines: Record<string, unknown>[] = []
    const destination = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(JSON.parse(chunk.toString()))
        callback()
      },
    })

    const settings = await loadSettings({ env: { LOG_LEVEL: "debug", SERVICE_NAME: "billing-api" } })
    const logger = createLoggerFromSettings(settings, { destination })
    const tenants = new AsyncTenantContext<AppTenant>()

    const options = new MultiTenantBuilder<AppTenant>({ settings, logger })
      .configureOptions((pipeline) =>
        pipeline.configure(BillingOptions, (o) => {
          o.currency = "EUR"
        }),
      )
      .withPerTenantOptions(BillingOptions, (o, tenant) => {
        o.planName = tenant.plan
        o.features.push(`region:${tenant.region}`)
      })
      .withStrategy("singleton", () => new HeaderStrategy())
      .withStore("singleton", () => new MapStore(records))
      .build({ tenantContext: tenants })

    // Stand-in for request middleware: identify, look up, then scope.
    async function handle<R>(request: Request, fn: () => Promise<R>): Promise<R> {
      const scope = options.services.createScope()
      const [strategy] = options.services.strategies(scope)
      const [store] = options.services.stores(scope)
      const identifier = await strategy?.identify(request)
      const tenant = identifier === undefined ? undefined : await store?.findByIdentifier(identifier)

      return tenant === undefined ? fn() : tenants.run(tenant, fn)
    }

    return { options, handle, lines }
  }

  it("serves each request the options of its tenant", async () => {
    const { options, handle } = await setup()
    const billing = options.accessor(BillingOptions)

    const [acme, globex] = await Promise.all([
      handle({ headers: { "x-tenant": "acme" } }, () => billing.value()),
      handle({ headers: { "x-tenant": "globex" } }, () => billing.value()),
    ])

    expect(acme).toMatchObject({ planName: "Gold", currency: "EUR", features: ["region:eu"] })
    expect(globex).toMatchObject({ planName: "Silver", currency: "EUR", features: ["region:us"] })
  })

  it("fails requests without a tenant when isolation is required", async () => {
    const { options, handle } = await setup()

    const error = await handle({ headers: {} }, () => options.resolve(BillingOptions)).catch(
      (err: unknown) => err,
    )

    expect(isOptionsError(error, "no_tenant_context")).toBe(true)
  })

  it("does not keep a build that raced a tenant invalidation", async () => {
    const { options, handle } = await setup()
    const gate = deferred<void>()
    let builds = 0

    const slow = new MultiTenantBuilder<AppTenant>({ settings: options.settings })
      .withPerTenantOptions(BillingOptions, async (o, tenant) => {
        builds++
        if (builds === 1) await gate.promise
        o.planName = tenant.plan
      })
      .build({ tenantContext: options.tenantContext })

    const pending = handle({ headers: { "x-tenant": "acme" } }, () => slow.resolve(BillingOptions))
    await vi.waitFor(() => expect(builds).toBe(1))

    expect(slow.invalidateTenant("tenant-a")).toBe(0)
    gate.resolve()

    const stale = await pending
    const fresh = await handle({ headers: { "x-tenant": "acme" } }, () => slow.resolve(BillingOptions))

    expect(stale.planName).toBe("Gold")
    expect(fresh).not.toBe(stale)
    expect(builds).toBe(2)
    expect(slow.cache.size).toBe(1)
  })

  it("logs with the configured service name", async () => {
    const { handle, options, lines } = await setup()

    await handle({ headers: { "x-tenant": "acme" } }, () => options.resolve(BillingOptions))

    expect(lines[0]).toMatchObject({
      msg: "multi-tenant options built",
      level: 30,
      service: "billing-api",
      mutators: 1,
      strategies: 1,
      stores: 1,
    })
    expect(lines).toContainEqual(
      expect.objectContaining({
        msg: "options built",
        level: 20,
        module: "options-resolver",
        optionsType: "BillingOptions",
        tenantId: "tenant-a",
      }),
    )
  })
})
