import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BuildTargetGraph, findResolutionProblem, targetUri } from '../../../src/graph/build-target-graph.js';
import { projectDefinitionSchema, type ProjectDefinitionInput } from '../../../src/common/schemas.js';
import { RequestError } from '../../../src/common/errors.js';

const posixOnly = describe.runIf(process.platform !== 'win32');

function project(input: ProjectDefinitionInput) {
  return projectDefinitionSchema.parse(input);
}

const core = project({
  name: 'core',
  directory: 'core',
  sources: ['src/main/scala/', 'src/main/scala/Main.scala'],
  generatedSources: ['target/gen/', 'src/main/scala/'],
  classesDir: 'out/core/classes',
  classpath: ['lib/scala-library.jar'],
  scalacOptions: ['-deprecation'],
  javacOptions: ['-Xlint'],
  scala: { version: '2.13.12', jars: ['lib/scala-compiler.jar'] },
  resolution: {
    modules: [
      {
        organization: 'org.typelevel',
        name: 'cats-core',
        version: '2.10.0',
        artifacts: [
          { name: 'cats-core', path: 'cache/cats.jar' },
          { name: 'cats-core', classifier: 'sources', path: 'cache/cats-sources.jar' },
        ],
      },
    ],
  },
});

const app = project({
  name: 'app',
  directory: 'app',
  sources: ['src/'],
  dependencies: ['core'],
  classesDir: 'out/app/classes',
  classpath: ['lib/scala-library.jar'],
  scala: { version: '3.3.1' },
  platform: 'js',
});

const appTests = project({
  name: 'app-test',
  directory: 'app',
  dependencies: ['app'],
  classesDir: 'out/app-test/classes',
  tags: ['test'],
});

posixOnly('BuildTargetGraph', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should name targets by workspace uri and project name', () => {
    expect(targetUri('/w', 'core')).toBe('file:///w/?id=core');
    expect(targetUri('/w/', 'my app')).toBe('file:///w/?id=my%20app');
  });

  it('should describe each project as a build target', () => {
    const graph = BuildTargetGraph.fromProjects('/w', [core, app, appTests]);
    const [coreTarget, appTarget, testTarget] = graph.targets();

    expect(graph.size).toBe(3);
    expect(coreTarget).toEqual({
      id: { uri: 'file:///w/?id=core' },
      displayName: 'core',
      baseDirectory: 'file:///w/core/',
      tags: ['library'],
      languageIds: ['scala', 'java'],
      dependencies: [],
      capabilities: { canCompile: true, canTest: false, canRun: true, canDebug: false },
      dataKind: 'scala',
      data: {
        scalaOrganization: 'org.scala-lang',
        scalaVersion: '2.13.12',
        scalaBinaryVersion: '2.13',
        platform: 1,
        jars: ['file:///w/lib/scala-compiler.jar'],
      },
    });
    expect(appTarget.dependencies).toEqual([{ uri: 'file:///w/?id=core' }]);
    expect(appTarget.data).toMatchObject({ scalaBinaryVersion: '3', platform: 2 });
    expect(testTarget.languageIds).toEqual(['java']);
    expect(testTarget.capabilities).toEqual({ canCompile: true, canTest: true, canRun: false, canDebug: false });
    expect(testTarget.dataKind).toBeUndefined();
  });

  it('should order dependencies before dependents, each once', () => {
    const graph = BuildTargetGraph.fromProjects('/w', [appTests, app, core]);
    const names = (uris: string[]) => graph.compileOrder(uris.map((uri) => ({ uri }))).map((node) => node.name);

    expect(names(['file:///w/?id=app-test'])).toEqual(['core', 'app', 'app-test']);
    expect(names(['file:///w/?id=app', 'file:///w/?id=core'])).toEqual(['core', 'app']);
    expect(names(['file:///w/?id=core', 'file:///w/?id=app-test', 'file:///w/?id=app'])).toEqual([
      'core',
      'app',
      'app-test',
    ]);
  });

  it('should reject an unknown target', () => {
    const graph = BuildTargetGraph.fromProjects('/w', [core]);
    expect(graph.has({ uri: 'file:///w/?id=ghost' })).toBe(false);
    expect(() => graph.node({ uri: 'file:///w/?id=ghost' })).toThrow(RequestError);
    expect(() => graph.compileOrder([{ uri: 'file:///w/?id=ghost' }])).toThrow('Unknown build target: file:///w/?id=ghost');
  });

  it('should build the classpath from own, dependency and external entries', () => {
    const graph = BuildTargetGraph.fromProjects('/w', [core, app]);

    expect(graph.compilerOptions({ uri: 'file:///w/?id=app' })).toEqual({
      target: { uri: 'file:///w/?id=app' },
      options: [],
      classpath: [
        'file:///w/out/app/classes',
        'file:///w/out/core/classes',
        'file:///w/lib/scala-library.jar',
        'file:///w/cache/cats.jar',
      ],
      classDirectory: 'file:///w/out/app/classes/',
    });
  });

  it('should pick options by language', () => {
    const graph = BuildTargetGraph.fromProjects('/w', [core]);
    expect(graph.compilerOptions({ uri: 'file:///w/?id=core' }).options).toEqual(['-deprecation']);
    expect(graph.compilerOptions({ uri: 'file:///w/?id=core' }, 'java').options).toEqual(['-Xlint']);
  });

  it('should list authored sources before generated ones without duplicates', () => {
    const graph = BuildTargetGraph.fromProjects('/w', [core]);

    expect(graph.sources({ uri: 'file:///w/?id=core' })).toEqual({
      target: { uri: 'file:///w/?id=core' },
      sources: [
        { uri: 'file:///w/core/src/main/scala/', kind: 2, generated: false },
        { uri: 'file:///w/core/src/main/scala/Main.scala', kind: 1, generated: false },
        { uri: 'file:///w/core/target/gen/', kind: 2, generated: true },
      ],
    });
    expect(graph.sourcePaths({ uri: 'file:///w/?id=core' })).toEqual([
      '/w/core/src/main/scala',
      '/w/core/src/main/scala/Main.scala',
      '/w/core/target/gen',
    ]);
  });

  it('should collect source artifacts of the target and its dependencies', () => {
    const graph = BuildTargetGraph.fromProjects('/w', [core, app]);
    expect(graph.dependencySources({ uri: 'file:///w/?id=app' })).toEqual({
      target: { uri: 'file:///w/?id=app' },
      sources: ['file:///w/cache/cats-sources.jar'],
    });
  });

  it('should expose no targets when the definitions do not resolve', () => {
    const cycleA = project({ name: 'a', directory: 'a', dependencies: ['b'], classesDir: 'out/a' });
    const cycleB = project({ name: 'b', directory: 'b', dependencies: ['a'], classesDir: 'out/b' });

    expect(findResolutionProblem([cycleA, cycleB])).toBe('dependency cycle a -> b -> a');
    expect(findResolutionProblem([app])).toBe('project app depends on undefined project core');
    expect(findResolutionProblem([core, core])).toBe('project core is defined more than once');
    expect(findResolutionProblem([core, app, appTests])).toBeNull();

    expect(BuildTargetGraph.fromProjects('/w', [cycleA, cycleB]).size).toBe(0);
    expect(BuildTargetGraph.fromProjects('/w', [app]).targets()).toEqual([]);
  });
});
