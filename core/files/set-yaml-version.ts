import { parseDocument, isScalar, isMap, type Node } from 'yaml'

/**
 * Replace the top-level `version` key of a YAML document.
 *
 * Comments, key order and the quoting style of the existing value are kept.
 *
 * @param content - YAML source.
 * @param version - New version value.
 * @returns Updated source, or null when there is no top-level `version` or
 *   the document cannot be parsed.
 */
export function setYamlVersion(content: string, version: string): string | null {
  let document = parseDocument<Node>(content)
  if (document.errors.length > 0 || !isMap(document.contents)) {
    return null
  }

  let node = document.contents.get('version', true)
  if (node === undefined) {
    return null
  }

  if (isScalar(node)) {
    node.value = version
  } else {
    document.contents.set('version', version)
  }

  return document.toString()
}
