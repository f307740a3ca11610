import type { TenantInfo } from "../ports/tenant-info"

export type AppTenant = TenantInfo & {
  plan: string
  region: string
}

export class BillingOptions {
  planName = "free"
  currency = "USD"
  seats = 1
  features: string[] = []
}

export class LoggingOptions {
  level = "info"
  sinks: string[] = ["stdout"]
}

export const tenantA: AppTenant = {
  id: "tenant-a",
  identifier: "acme",
  name: "Acme",
  plan: "Gold",
  region: "eu",
}

export const tenantB: AppTenant = {
  id: "tenant-b",
  identifier: "globex",
  name: "Globex",
  plan: "Silver",
  region: "us",
}

export type Deferred<T> = {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (reason: unknown) => void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {}
  let reject: (reason: unknown) => void = () => {}

  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })

  return { promise, resolve, reject }
}

/** Let queued promise callbacks run. */
export async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 10; i++) await Promise.resolve()
}
