import { describe, it, expect } from "vitest"
import { Effect } from "effect"

import { generateIds } from "~/deploy/ids"
import { filterRules, ruleId } from "~/deploy/rules"
import type { DownloadRule, EnvironmentsDocument } from "~/deploy/schema"
import { acmeClient, acmeEnvironments, acmeRules } from "./helpers/fixtures"

const filter = (rules: ReadonlyArray<DownloadRule>, environments: EnvironmentsDocument = acmeEnvironments) =>
  Effect.gen(function* () {
    const ids = yield* generateIds(acmeClient, environments)
    const ruleSets = yield* filterRules(rules, ids)
    return { ids, ruleSets }
  })

const twoEnvironments = {
  prod: acmeEnvironments.prod,
  staging: {
    name: "Staging",
    tag: "stg",
    pipelines: { p1: { name: "Daily load" }, p3: { name: "Backfill" } },
  },
}

describe("ruleId", () => {

  it("should number rules within their pipeline", () => {
    expect(ruleId("acme-pipe-0123", 2)).toBe("acme-pipe-0123#rule_2")
  })

})

describe("filterRules", () => {

  it("should attach every rule to its pipeline", () => {
    const { ids, ruleSets } = Effect.runSync(filter(acmeRules))
    const prod = ids.environments[0]
    const pipelineId = prod?.pipelines.get("p1") ?? ""

    expect(ruleSets).toHaveLength(1)
    expect(ruleSets[0]).toEqual({
      environmentKey: "prod",
      envId: prod?.envId,
      pipelineKey: "p1",
      pipelineId,
      rules: [
        {
          rule_id: `${pipelineId}#rule_1`,
          env_id: prod?.envId,
          client_id: ids.clientId,
          pipeline_id: pipelineId,
          description: "CSV exports",
          type: "extension",
          values: "csv",
        },
        {
          rule_id: `${pipelineId}#rule_2`,
          env_id: prod?.envId,
          client_id: ids.clientId,
          pipeline_id: pipelineId,
          description: "Daily reports",
          type: "prefix",
          values: "report_",
        },
      ],
    })
  })

  it("should fail on the first rule naming an unknown pipeline", () => {
    const rules = [
      ...acmeRules,
      { description: "Orphan", type: "extension", values: "xml", pipeline: "p2" },
      { description: "Orphan too", type: "extension", values: "txt", pipeline: "p9" },
    ]
    const error = Effect.runSync(Effect.flip(filter(rules)))

    expect(error).toMatchObject({ _tag: "UnknownPipelineError", pipeline: "p2", ruleIndex: 2 })
    expect(error).not.toHaveProperty("environment")
  })

  it("should apply a rule to the same pipeline key in every environment", () => {
    const { ruleSets } = Effect.runSync(filter(acmeRules, twoEnvironments))

    expect(ruleSets.map(set => [set.environmentKey, set.pipelineKey, set.rules.length])).toEqual([
      ["prod", "p1", 2],
      ["staging", "p1", 2],
      ["staging", "p3", 0],
    ])
    expect(ruleSets[0]?.pipelineId).not.toBe(ruleSets[1]?.pipelineId)
  })

  it("should restrict a rule to the environment it names", () => {
    const rules: DownloadRule[] = [
      { description: "CSV exports", type: "extension", values: "csv", pipeline: "p1" },
      { description: "Staging only", type: "prefix", values: "stg_", pipeline: "p1", environment: "staging" },
    ]
    const { ruleSets } = Effect.runSync(filter(rules, twoEnvironments))

    const [prodP1, stagingP1] = ruleSets
    expect(prodP1?.rules.map(rule => rule.description)).toEqual(["CSV exports"])
    expect(stagingP1?.rules.map(rule => [rule.rule_id, rule.description])).toEqual([
      [`${stagingP1?.pipelineId}#rule_1`, "CSV exports"],
      [`${stagingP1?.pipelineId}#rule_2`, "Staging only"],
    ])
  })

  it("should report the environment of a narrowed rule that matches nothing", () => {
    const rules = [{ description: "Backfill", type: "prefix", values: "old_", pipeline: "p3", environment: "prod" }]
    const error = Effect.runSync(Effect.flip(filter(rules, twoEnvironments)))

    expect(error).toMatchObject({ _tag: "UnknownPipelineError", pipeline: "p3", ruleIndex: 0, environment: "prod" })
  })

  it("should keep pipelines without rules as empty sets", () => {
    const { ruleSets } = Effect.runSync(filter([]))

    expect(ruleSets).toHaveLength(1)
    expect(ruleSets[0]?.rules).toEqual([])
  })

  it("should account for every rule in one environment", () => {
    const rules = [
      ...acmeRules,
      { description: "Archives", type: "extension", values: "zip", pipeline: "p3" },
    ]
    const { ruleSets } = Effect.runSync(filter(rules, {
      prod: { ...acmeEnvironments.prod, pipelines: { ...acmeEnvironments.prod.pipelines, p3: { name: "Backfill" } } },
    }))

    expect(ruleSets.reduce((total, set) => total + set.rules.length, 0)).toBe(rules.length)
  })

})
