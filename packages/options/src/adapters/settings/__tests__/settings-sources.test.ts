import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { SettingsError } from "../../../core/errors/errors"
import { loadSettings } from "../../../core/settings/load-settings"
import { DotenvSettingsSource } from "../dotenv-settings-source"
import { EnvSettingsSource } from "../env-settings-source"

describe("EnvSettingsSource", () => {
  it("reads only the known setting keys", async () => {
    const source = new EnvSettingsSource({
      env: { LOG_LEVEL: "debug", DATABASE_URL: "postgres://localhost/app", HOME: "/root" },
    })

    await expect(source.load()).resolves.toEqual({ LOG_LEVEL: "debug" })
    expect(source.name).toBe("env")
  })

  it("reads prefixed keys and ignores unprefixed ones", async () => {
    const source = new EnvSettingsSource({
      prefix: "BILLING_",
      env: { BILLING_LOG_LEVEL: "trace", LOG_LEVEL: "fatal", BILLING_PORT: "8080" },
    })

    await expect(source.load()).resolves.toEqual({ LOG_LEVEL: "trace" })
    expect(source.name).toBe("env:BILLING_*")
  })
})

describe("DotenvSettingsSource", () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "tenantry-settings-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("parses the known keys of a .env file relative to cwd", async () => {
    await fs.writeFile(
      path.join(dir, ".env"),
      'LOG_LEVEL=warn\nSERVICE_NAME="from-file"\nSESSION_SECRET=test-secret\n',
    )
    const source = new DotenvSettingsSource({ file: ".env", required: true, cwd: dir })

    await expect(source.load()).resolves.toEqual({ LOG_LEVEL: "warn", SERVICE_NAME: "from-file" })
    expect(source.name).toBe("dotenv:.env")
  })

  it("applies a prefix", async () => {
    await fs.writeFile(path.join(dir, ".env"), "BILLING_LOG_PRETTY=true\nLOG_PRETTY=false\n")
    const source = new DotenvSettingsSource({
      file: ".env",
      required: true,
      prefix: "BILLING_",
      cwd: dir,
    })

    await expect(source.load()).resolves.toEqual({ LOG_PRETTY: "true" })
  })

  it("yields nothing for a missing optional file", async () => {
    const source = new DotenvSettingsSource({ file: ".env.local", required: false, cwd: dir })

    await expect(source.load()).resolves.toEqual({})
  })

  it("fails with a SettingsError for a missing required file", async () => {
    const source = new DotenvSettingsSource({ file: ".env", required: true, cwd: dir })

    const error = await source.load().catch((err: unknown) => err)

    expect(error).toBeInstanceOf(SettingsError)
    expect(error).toMatchObject({
      message: "Required settings file .env was not found",
      context: { source: "dotenv:.env", path: path.join(dir, ".env") },
    })
  })

  it("is overridden by the environment when listed first", async () => {
    await fs.writeFile(path.join(dir, ".env"), "LOG_LEVEL=warn\nLOG_PRETTY=true\n")

    const settings = await loadSettings({
      sources: [
        new DotenvSettingsSource({ file: ".env", required: false, cwd: dir }),
        new EnvSettingsSource({ env: { LOG_LEVEL: "error" } }),
      ],
    })

    expect(settings.logging).toEqual({ level: "error", prettify: true, serviceName: "tenantry" })
  })

  it("names the file that supplied a rejected value", async () => {
    await fs.writeFile(path.join(dir, ".env"), "LOG_LEVEL=loud\n")

    const error = await loadSettings({
      sources: [
        new DotenvSettingsSource({ file: ".env", required: true, cwd: dir }),
        new EnvSettingsSource({ env: { SERVICE_NAME: "billing-api" } }),
      ],
    }).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(SettingsError)
    expect(error).toMatchObject({ context: { origins: { LOG_LEVEL: "dotenv:.env" } } })
  })
})
