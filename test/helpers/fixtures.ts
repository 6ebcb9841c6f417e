import * as fs from "fs/promises"
import * as os from "os"
import * as path from "path"

import type { DeployOptions } from "~/config"

export const acmeClient = { name: "Acme", tag: "acme" }

export const acmeEnvironments = {
  prod: {
    name: "Production",
    tag: "prod",
    connections: {
      warehouse: {
        name: "Warehouse",
        type: "postgres",
        username: "loader",
        password: "secret.pw",
        login_url: "https://db.example.test",
      },
    },
    pipelines: {
      p1: {
        name: "Daily load",
        connections: { target: "warehouse" },
      },
    },
    secret: { pw: "s3cr3t" },
  },
}

export const acmeRules = [
  { description: "CSV exports", type: "extension", values: "csv", pipeline: "p1" },
  { description: "Daily reports", type: "prefix", values: "report_", pipeline: "p1" },
]

export const makeTempDir = () => fs.mkdtemp(path.join(os.tmpdir(), "config-deployer-"))

/**
 * Write an input directory. Strings are written verbatim, anything else as JSON.
 */
export const writeInputDir = async (files: Record<string, unknown>): Promise<string> => {
  const dir = await makeTempDir()
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(
      path.join(dir, name),
      typeof content === "string" ? content : JSON.stringify(content, null, 2),
    )
  }
  return dir
}

export const acmeInputDir = (overrides: Record<string, unknown> = {}) =>
  writeInputDir({
    "client.json": acmeClient,
    "environments.json": acmeEnvironments,
    "download_rules.json": acmeRules,
    ...overrides,
  })

export const deployOptions = (inputDir: string, overrides: Partial<DeployOptions> = {}): DeployOptions => ({
  inputDir,
  tableName: "spec-download-rule",
  enrichmentTableName: "spec-enrichment-rule",
  skipRules: false,
  skipEnrichmentRules: false,
  ...overrides,
})
