/**
 * Glob matcher for slash-separated paths
 *
 * - `**` spans directories (`**` + `/` also matches zero directories)
 * - `*` and `?` stay within one segment
 * - a pattern without `/` matches the basename at any depth
 *
 * Matching is case-insensitive.
 */

function globToRegExp(pattern: string): RegExp {
  let source = ''
  let i = 0

  while (i < pattern.length) {
    const ch = pattern[i]
    if (ch === '*' && pattern[i + 1] === '*') {
      if (pattern[i + 2] === '/') {
        source += '(?:.*/)?'
        i += 3
      } else {
        source += '.*'
        i += 2
      }
    } else if (ch === '*') {
      source += '[^/]*'
      i++
    } else if (ch === '?') {
      source += '[^/]'
      i++
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&')
      i++
    }
  }

  return new RegExp(`^${source}$`, 'i')
}

export function compileGlobPatterns(patterns: readonly string[]): (value: string) => boolean {
  const matchers = patterns
    .map(pattern => pattern.trim())
    .filter(Boolean)
    .map(pattern => {
      const regex = globToRegExp(pattern)
      const basenameOnly = !pattern.includes('/')
      return (value: string) => regex.test(basenameOnly ? value.slice(value.lastIndexOf('/') + 1) : value)
    })

  if (matchers.length === 0) {
    return () => false
  }

  return (value: string) => matchers.some(match => match(value))
}
