/**
 * Store adapter for CLI
 * Opens a ModelConfigStore over a directory-backed document store
 */

import { ZodError } from "zod";
import {
  FsDocumentStore,
  ModelConfigStore,
  fromJSON,
  type ModelConfig,
  type StoreConfig,
} from "@modelstore/sdk";
import { CliError } from "./errors.js";

/**
 * CLI Store interface
 */
export interface CliStore {
  /** Resolved index configuration */
  readonly config: StoreConfig;

  /**
   * Validate and create a model config; never overwrites
   */
  put(doc: unknown): Promise<ModelConfig>;

  /**
   * Retrieve the latest model config with this id
   */
  get(modelId: string): Promise<ModelConfig>;

  /**
   * Remove every stored version of a model config
   */
  remove(modelId: string): Promise<void>;
}

function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Open a CLI store at the given root
 * @throws CliError if the index configuration is invalid
 */
export function openCliStore(root: string, overrides: Partial<StoreConfig> = {}): CliStore {
  let models: ModelConfigStore;
  try {
    models = new ModelConfigStore({ documents: new FsDocumentStore(root), config: overrides });
  } catch (err) {
    if (err instanceof ZodError) {
      throw new CliError(`Invalid store configuration: ${formatIssues(err)}`, { cause: err });
    }
    throw err;
  }

  return {
    config: models.config,

    async put(doc) {
      if (typeof doc !== "object" || doc === null || Array.isArray(doc)) {
        throw new CliError("Model config must be a JSON object");
      }

      let config: ModelConfig;
      try {
        config = fromJSON(doc, { lenient: true });
      } catch (err) {
        if (err instanceof ZodError) {
          throw new CliError(`Invalid model config: ${formatIssues(err)}`, { cause: err });
        }
        throw err;
      }

      await models.storeModel(config);
      return config;
    },

    async get(modelId) {
      return models.getModel(modelId);
    },

    async remove(modelId) {
      await models.deleteModel(modelId);
    },
  };
}
