import type { RawShelfConfig, ResolvedShelfConfig } from "../config";
import { findProjectDir, loadConfig, resolveConfig } from "../config";
import { loadCollection, type Collection } from "../content/collection";

export interface BaseCommandOptions {
  path?: string;
  verbose?: boolean;
}

export interface ProjectConfigResult {
  projectDir: string;
  raw: RawShelfConfig;
  resolved: ResolvedShelfConfig;
}

export interface ProjectContext extends ProjectConfigResult {
  collection: Collection;
}

export const withConfig = async (options: BaseCommandOptions = {}): Promise<ProjectConfigResult> => {
  const projectDir = await findProjectDir(options);
  const raw = await loadConfig(projectDir);

  if (options.verbose) {
    console.log("\n=== Configuration Loading ===");
    console.log(`Project dir: ${projectDir}`);
    console.log(JSON.stringify(raw, null, 2));
    console.log("=== End Configuration Loading ===\n");
  }

  const resolved = resolveConfig(raw, projectDir);
  return { projectDir, raw, resolved };
};

export const withCollection = async (options: BaseCommandOptions = {}): Promise<ProjectContext> => {
  const configInfo = await withConfig(options);
  const collection = await loadCollection(configInfo.resolved.content.dir, configInfo.resolved.schema);

  if (options.verbose) {
    console.log(
      `Loaded ${collection.posts.length} of ${collection.files.length} document(s) from ${collection.contentDir}`,
    );
  }

  return { ...configInfo, collection };
};
