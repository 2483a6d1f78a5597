import { readdir } from 'node:fs/promises';

export interface ProjectContext {
  readonly descriptors: readonly string[];
}

/** Marker file → label, in the order labels appear in the prompt. */
export const PROJECT_MARKERS: ReadonlyArray<readonly [marker: string, label: string]> = [
  ['go.mod', 'Go project.'],
  ['package.json', 'JavaScript/Node.js project.'],
  ['pom.xml', 'Java/Maven project.'],
  ['CMakeLists.txt', 'C/C++ project with CMake.'],
  ['pyproject.toml', 'Python project.'],
  ['Cargo.toml', 'Rust project.'],
  ['Gemfile', 'Ruby project.'],
];

export function matchProjectMarkers(entries: Iterable<string>): ProjectContext {
  const present = new Set(entries);
  const descriptors = PROJECT_MARKERS
    .filter(([marker]) => present.has(marker))
    .map(([, label]) => label);
  return Object.freeze({ descriptors: Object.freeze(descriptors) });
}

/**
 * Look at the top level of `workingDir` only. Rejects if the directory
 * cannot be listed; callers treat that as "no context".
 */
export async function describeProject(workingDir: string): Promise<ProjectContext> {
  const entries = await readdir(workingDir);
  return matchProjectMarkers(entries);
}
