/**
 * Loads project definitions from `<workspace>/.buildlink/*.json` and builds
 * the target graph from them.
 *
 * This file MUST use `path.join()` for all file paths (Windows CI compatibility).
 */

import fs from 'fs/promises';
import path from 'path';
import { WORKSPACE_DIR_NAME } from '../common/config.js';
import { projectDefinitionSchema, type ProjectDefinition } from '../common/schemas.js';
import { BuildTargetGraph } from './build-target-graph.js';

export function workspaceConfigDir(workspaceRoot: string): string {
  return path.join(workspaceRoot, WORKSPACE_DIR_NAME);
}

/**
 * Read every project file. Files that are not valid JSON or do not match
 * the schema are skipped with a warning; a dependency on a skipped project
 * then leaves the graph unresolved.
 */
export async function readProjectDefinitions(workspaceRoot: string): Promise<ProjectDefinition[]> {
  const configDir = workspaceConfigDir(workspaceRoot);
  let names: string[];
  try {
    names = (await fs.readdir(configDir)).filter((name) => name.endsWith('.json')).sort();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      console.warn(`[WorkspaceLoader] No ${WORKSPACE_DIR_NAME} directory in ${workspaceRoot}`);
      return [];
    }
    throw err;
  }

  const definitions: ProjectDefinition[] = [];
  for (const name of names) {
    const filePath = path.join(configDir, name);
    let json: unknown;
    try {
      json = JSON.parse(await fs.readFile(filePath, 'utf8'));
    } catch (err) {
      console.warn(`[WorkspaceLoader] Skipping ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }
    const parsed = projectDefinitionSchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`[WorkspaceLoader] Skipping ${filePath}: ${parsed.error.message}`);
      continue;
    }
    definitions.push(parsed.data);
  }
  return definitions;
}

export async function loadWorkspaceGraph(workspaceRoot: string): Promise<BuildTargetGraph> {
  const root = path.resolve(workspaceRoot);
  const definitions = await readProjectDefinitions(root);
  const graph = BuildTargetGraph.fromProjects(root, definitions);
  console.log(`[WorkspaceLoader] Loaded ${graph.size} build target(s) from ${root}`);
  return graph;
}
