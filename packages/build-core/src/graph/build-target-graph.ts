/**
 * Build-Target Graph
 *
 * Immutable index of the workspace's projects that the server's request
 * handlers query. A reload builds a new graph; nothing here mutates after
 * construction. A definition set that does not resolve (a dependency cycle,
 * a dependency on an undefined project, a duplicated name) yields the empty
 * graph.
 *
 * This file MUST use `path.join()` for all file paths (Windows CI compatibility).
 */

import path from 'path';
import { pathToFileURL } from 'url';
import { RequestError } from '../common/errors.js';
import type { ProjectDefinition } from '../common/schemas.js';
import {
  SCALA_PLATFORM,
  type BuildTarget,
  type BuildTargetIdentifier,
  type CompilerOptionsItem,
  type DependencySourcesItem,
  type ScalaPlatform,
  type SourceItem,
  type SourcesItem,
} from '../common/types/build.js';

export interface ProjectNode {
  readonly name: string;
  readonly id: BuildTargetIdentifier;
  readonly target: BuildTarget;
  readonly definition: ProjectDefinition;
  /** Absolute project directory */
  readonly directory: string;
  /** Absolute classes directory */
  readonly classesDir: string;
}

export type CompilerLanguage = 'scala' | 'java';

const PLATFORMS: Record<ProjectDefinition['platform'], ScalaPlatform> = {
  jvm: SCALA_PLATFORM.JVM,
  js: SCALA_PLATFORM.JS,
  native: SCALA_PLATFORM.NATIVE,
};

/** `file://<workspace>/?id=<name>` */
export function targetUri(workspaceRoot: string, name: string): string {
  const base = pathToFileURL(path.resolve(workspaceRoot)).href.replace(/\/?$/, '/');
  return `${base}?id=${encodeURIComponent(name)}`;
}

function toUri(absolutePath: string, directory = false): string {
  const href = pathToFileURL(absolutePath).href;
  return directory ? href.replace(/\/?$/, '/') : href;
}

function scalaBinaryVersion(version: string): string {
  const [major, minor] = version.split('.');
  return major === '3' ? '3' : `${major}.${minor ?? '0'}`;
}

function distinct<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

function toBuildTarget(workspaceRoot: string, definition: ProjectDefinition, directory: string): BuildTarget {
  const isTest = definition.tags.includes('test');
  const target: BuildTarget = {
    id: { uri: targetUri(workspaceRoot, definition.name) },
    displayName: definition.name,
    baseDirectory: toUri(directory, true),
    tags: definition.tags.length > 0 ? definition.tags : ['library'],
    languageIds: definition.scala ? ['scala', 'java'] : ['java'],
    dependencies: definition.dependencies.map((name) => ({ uri: targetUri(workspaceRoot, name) })),
    capabilities: { canCompile: true, canTest: isTest, canRun: !isTest, canDebug: false },
  };
  if (definition.scala) {
    target.dataKind = 'scala';
    target.data = {
      scalaOrganization: definition.scala.organization,
      scalaVersion: definition.scala.version,
      scalaBinaryVersion: scalaBinaryVersion(definition.scala.version),
      platform: PLATFORMS[definition.platform],
      jars: definition.scala.jars.map((jar) => toUri(path.resolve(workspaceRoot, jar))),
    };
  }
  return target;
}

/** Why a definition set does not resolve, or null when it does. */
export function findResolutionProblem(definitions: ProjectDefinition[]): string | null {
  const byName = new Map<string, ProjectDefinition>();
  for (const definition of definitions) {
    if (byName.has(definition.name)) {
      return `project ${definition.name} is defined more than once`;
    }
    byName.set(definition.name, definition);
  }
  for (const definition of definitions) {
    for (const dependency of definition.dependencies) {
      if (!byName.has(dependency)) {
        return `project ${definition.name} depends on undefined project ${dependency}`;
      }
    }
  }

  const state = new Map<string, 'visiting' | 'done'>();
  const visit = (name: string, trail: string[]): string | null => {
    const current = state.get(name);
    if (current === 'done') {
      return null;
    }
    if (current === 'visiting') {
      return `dependency cycle ${[...trail.slice(trail.indexOf(name)), name].join(' -> ')}`;
    }
    state.set(name, 'visiting');
    for (const dependency of byName.get(name)?.dependencies ?? []) {
      const problem = visit(dependency, [...trail, name]);
      if (problem) {
        return problem;
      }
    }
    state.set(name, 'done');
    return null;
  };
  for (const definition of definitions) {
    const problem = visit(definition.name, []);
    if (problem) {
      return problem;
    }
  }
  return null;
}

export class BuildTargetGraph {
  private readonly nodes: ReadonlyMap<string, ProjectNode>;
  private readonly byName: ReadonlyMap<string, ProjectNode>;

  private constructor(
    readonly workspaceRoot: string,
    nodes: ProjectNode[],
  ) {
    this.nodes = new Map(nodes.map((node) => [node.id.uri, node]));
    this.byName = new Map(nodes.map((node) => [node.name, node]));
  }

  static empty(workspaceRoot: string): BuildTargetGraph {
    return new BuildTargetGraph(path.resolve(workspaceRoot), []);
  }

  /** Build a graph, or the empty graph when the definitions do not resolve. */
  static fromProjects(workspaceRoot: string, definitions: ProjectDefinition[]): BuildTargetGraph {
    const root = path.resolve(workspaceRoot);
    const problem = findResolutionProblem(definitions);
    if (problem) {
      console.warn(`[BuildTargetGraph] Workspace ${root} does not resolve (${problem}); exposing no targets`);
      return BuildTargetGraph.empty(root);
    }
    const nodes = definitions.map((definition): ProjectNode => {
      const directory = path.resolve(root, definition.directory);
      return {
        name: definition.name,
        id: { uri: targetUri(root, definition.name) },
        target: toBuildTarget(root, definition, directory),
        definition,
        directory,
        classesDir: path.resolve(root, definition.classesDir),
      };
    });
    return new BuildTargetGraph(root, nodes);
  }

  get size(): number {
    return this.nodes.size;
  }

  targets(): BuildTarget[] {
    return [...this.nodes.values()].map((node) => node.target);
  }

  has(id: BuildTargetIdentifier): boolean {
    return this.nodes.has(id.uri);
  }

  /** @throws RequestError('unknownTarget') */
  node(id: BuildTargetIdentifier): ProjectNode {
    const node = this.nodes.get(id.uri);
    if (!node) {
      throw new RequestError('unknownTarget', `Unknown build target: ${id.uri}`);
    }
    return node;
  }

  /** Transitive dependencies of a node, dependencies before dependents, excluding the node. */
  dependenciesOf(node: ProjectNode): ProjectNode[] {
    const ordered: ProjectNode[] = [];
    const seen = new Set<string>([node.name]);
    const visit = (current: ProjectNode): void => {
      for (const name of current.definition.dependencies) {
        const dependency = this.byName.get(name);
        if (!dependency || seen.has(name)) {
          continue;
        }
        seen.add(name);
        visit(dependency);
        ordered.push(dependency);
      }
    };
    visit(node);
    return ordered;
  }

  /**
   * The requested targets plus their transitive dependencies, each once,
   * dependencies first.
   * @throws RequestError('unknownTarget')
   */
  compileOrder(ids: BuildTargetIdentifier[]): ProjectNode[] {
    const ordered: ProjectNode[] = [];
    const seen = new Set<string>();
    for (const id of ids) {
      const node = this.node(id);
      for (const candidate of [...this.dependenciesOf(node), node]) {
        if (!seen.has(candidate.name)) {
          seen.add(candidate.name);
          ordered.push(candidate);
        }
      }
    }
    return ordered;
  }

  /**
   * Options, class directory and classpath for a target. The classpath is
   * the target's own classes directory, then its dependencies' classes
   * directories, then external entries; each appears once.
   */
  compilerOptions(id: BuildTargetIdentifier, language: CompilerLanguage = 'scala'): CompilerOptionsItem {
    const node = this.node(id);
    const dependencies = this.dependenciesOf(node);
    const external: string[] = [];
    for (const project of [node, ...dependencies]) {
      for (const entry of project.definition.classpath) {
        external.push(path.resolve(this.workspaceRoot, entry));
      }
      for (const module of project.definition.resolution?.modules ?? []) {
        for (const artifact of module.artifacts) {
          if (artifact.classifier === undefined) {
            external.push(path.resolve(this.workspaceRoot, artifact.path));
          }
        }
      }
    }
    const classpath = distinct([
      node.classesDir,
      ...dependencies.map((dependency) => dependency.classesDir),
      ...external,
    ]).map((entry) => toUri(entry));

    return {
      target: node.id,
      options: language === 'scala' ? node.definition.scalacOptions : node.definition.javacOptions,
      classpath,
      classDirectory: toUri(node.classesDir, true),
    };
  }

  /** Authored sources first, then generated ones. Entries ending in `/` are directories. */
  sources(id: BuildTargetIdentifier): SourcesItem {
    const node = this.node(id);
    const toItem = (entry: string, generated: boolean): SourceItem => {
      const isDirectory = entry.endsWith('/');
      return {
        uri: toUri(path.resolve(node.directory, entry), isDirectory),
        kind: isDirectory ? 2 : 1,
        generated,
      };
    };
    const authored = distinct(node.definition.sources).map((entry) => toItem(entry, false));
    const authoredUris = new Set(authored.map((item) => item.uri));
    const generated = distinct(node.definition.generatedSources)
      .map((entry) => toItem(entry, true))
      .filter((item) => !authoredUris.has(item.uri));
    return { target: node.id, sources: [...authored, ...generated] };
  }

  /** Absolute source file and directory paths of a target, authored and generated. */
  sourcePaths(id: BuildTargetIdentifier): string[] {
    const node = this.node(id);
    return distinct([...node.definition.sources, ...node.definition.generatedSources]).map((entry) =>
      path.resolve(node.directory, entry),
    );
  }

  /**
   * Distinct `sources`-classified artifacts of the target's resolution and
   * its dependencies' resolutions.
   */
  dependencySources(id: BuildTargetIdentifier): DependencySourcesItem {
    const node = this.node(id);
    const sources: string[] = [];
    for (const project of [node, ...this.dependenciesOf(node)]) {
      for (const module of project.definition.resolution?.modules ?? []) {
        for (const artifact of module.artifacts) {
          if (artifact.classifier === 'sources') {
            sources.push(toUri(path.resolve(this.workspaceRoot, artifact.path)));
          }
        }
      }
    }
    return { target: node.id, sources: distinct(sources) };
  }
}
