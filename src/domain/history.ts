/**
 * Commit graph helpers over stored repositories
 */

import type { StoredCommit, StoredRepository } from './types.js'

/**
 * Commit ids reachable from `head` (inclusive). Iterative walk; missing
 * parents are ignored.
 */
export function reachableCommits(repository: StoredRepository, head: string | undefined): Set<string> {
  const seen = new Set<string>()
  if (!head) return seen

  const stack = [head]
  while (stack.length > 0) {
    const id = stack.pop()
    if (id === undefined || seen.has(id)) continue
    const commit = repository.commits[id]
    if (!commit) continue
    seen.add(id)
    stack.push(...commit.parents)
  }
  return seen
}

export function countReachable(repository: StoredRepository, branch: string): number {
  return reachableCommits(repository, repository.branches[branch]).size
}

export function headCommit(repository: StoredRepository, branch: string = repository.defaultBranch): StoredCommit | undefined {
  const id = repository.branches[branch]
  return id ? repository.commits[id] : undefined
}

/**
 * Tree of a branch head; empty when the branch does not exist
 */
export function branchTree(repository: StoredRepository, branch: string): Record<string, string> {
  return { ...(headCommit(repository, branch)?.tree ?? {}) }
}

/**
 * The consolidated view: default-branch tree with every grafted subtree
 * overlaid under its mount path
 */
export function consolidatedTree(repository: StoredRepository): Record<string, string> {
  const tree = branchTree(repository, repository.defaultBranch)
  for (const mount of repository.mounts) {
    for (const [path, content] of Object.entries(branchTree(repository, mount.ref))) {
      tree[`${mount.path}/${path}`] = content
    }
  }
  return tree
}

/**
 * Stable serialization of everything that makes up a commit's identity
 */
export function canonicalCommit(commit: StoredCommit): string {
  const tree = Object.keys(commit.tree).sort().map(path => [path, commit.tree[path]])
  return JSON.stringify([
    commit.id,
    [...commit.parents],
    commit.author.name,
    commit.author.email,
    commit.timestamp,
    commit.message,
    tree
  ])
}

export function latestTimestamp(repository: StoredRepository): string | undefined {
  let latest: string | undefined
  for (const commit of Object.values(repository.commits)) {
    if (!latest || Date.parse(commit.timestamp) > Date.parse(latest)) {
      latest = commit.timestamp
    }
  }
  return latest
}
