import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { loadModel } from "../src/modelLoader";
import type { SemanticModel } from "../src/semanticModel";

export const fixturePath = fileURLToPath(new URL("./fixtures/model.yaml", import.meta.url));

export const fixtureYaml = readFileSync(fixturePath, "utf8");

export function fixtureModel(): SemanticModel {
  const result = loadModel(fixtureYaml);
  if (!result.ok) throw result.error;
  return result.model;
}

/** "Today" for default lookback windows: 2024-03-31. */
export const fixedClock = () => new Date("2024-03-31T12:00:00Z");

export async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected the promise to reject");
}
