/**
 * Basic Usage Example
 *
 * Stores, reads, rolls over and deletes a model config on disk.
 * Run with: npx tsx examples/basic-usage.ts
 */

import {
  FsDocumentStore,
  ModelAlreadyExistsError,
  openModelConfigStore,
  type ModelConfig,
} from "@modelstore/sdk";
import { rm } from "node:fs/promises";

async function main(): Promise<void> {
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });

  const documents = new FsDocumentStore(dataDir);
  const models = openModelConfigStore({ documents });

  const config: ModelConfig = {
    modelId: "house-prices",
    createdBy: "examples",
    version: "1",
    description: "Regression over listing features",
    createTime: Date.now(),
    tags: ["regression"],
    input: { fieldNames: ["rooms", "area", "postcode"] },
  };

  // CREATE
  await models.storeModel(config);
  console.log(`Stored ${config.modelId} in ${models.config.writeIndex}`);

  // Create-only: a second store of the same id fails
  try {
    await models.storeModel({ ...config, version: "2" });
  } catch (err) {
    if (err instanceof ModelAlreadyExistsError) {
      console.log(`Refused to overwrite: ${err.message}`);
    } else {
      throw err;
    }
  }

  // Callback form, after rolling over to the next generation
  const rolled = openModelConfigStore({
    documents,
    config: { writeIndex: ".model-configs-000002" },
  });
  await new Promise<void>((resolve, reject) => {
    rolled.store({ ...config, version: "2" }, (outcome) =>
      outcome.success ? resolve() : reject(outcome.error)
    );
  });

  // READ: the newest generation wins
  const latest = await models.getModel(config.modelId);
  console.log(`Latest version: ${latest.version}`);

  // DELETE: every generation
  await models.deleteModel(config.modelId);
  console.log(`Deleted ${config.modelId}`);

  await rm(dataDir, { recursive: true, force: true });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
