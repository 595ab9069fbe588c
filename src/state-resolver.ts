import * as core from '@actions/core'
import { KUBERNETES } from './constants.js'
import { describeError } from './errors.js'
import { buildKubectlArgs, type KubectlRunner } from './kubectl-runner.js'
import type { ResourceIdentity } from './types.js'

/**
 * Reads the live, fully serialized form of one resource
 */
export interface LiveStateReader {
  read(identity: ResourceIdentity): Promise<string>
}

/**
 * Reads live state with `kubectl get <kind> <name> -n <namespace> -o yaml`
 */
export class KubectlStateReader implements LiveStateReader {
  constructor(private runner: KubectlRunner) {}

  async read(identity: ResourceIdentity): Promise<string> {
    return this.runner.capture(
      buildKubectlArgs('get', {
        namespace: identity.namespace,
        output: 'yaml',
        args: [identity.kind, identity.name]
      })
    )
  }
}

const KIND_PATTERN = /^[ \t]*kind:[ \t]*(\w+)/m
const NAME_PATTERN = /^[ \t]*name:[ \t]*(\S+)/m
const NAMESPACE_PATTERN = /^[ \t]*namespace:[ \t]*(\S+)/m

/**
 * Maps a multi-document manifest to the live state of the resources it
 * describes.
 *
 * Identities are taken from the first `kind:`, `name:` and `namespace:`
 * lines of each document rather than from a structural parse, so a nested
 * field with one of those names that appears before the real one wins.
 */
export class ClusterStateResolver {
  constructor(private reader: LiveStateReader) {}

  /**
   * Resolves every document of `manifest` to its live state, keeping the
   * document itself when the lookup fails. Documents without a usable
   * identity are left out.
   *
   * @param defaultNamespace - Namespace for documents that do not name one
   */
  async resolve(manifest: string, defaultNamespace: string): Promise<string> {
    const resolved: string[] = []

    for (const document of splitDocuments(manifest)) {
      const identity = extractIdentity(document, defaultNamespace)
      if (!identity) {
        continue
      }

      try {
        resolved.push((await this.reader.read(identity)).trim())
      } catch (error) {
        core.warning(
          `Could not read live state of ${identity.kind}/${identity.name} in namespace ${identity.namespace}, recording the manifest instead: ${describeError(error)}`
        )
        resolved.push(document)
      }
    }

    return resolved.join(KUBERNETES.DOCUMENT_JOINER)
  }
}

/**
 * Splits a blob on `---` separator lines, dropping empty documents.
 */
export function splitDocuments(manifest: string): string[] {
  return manifest
    .split(KUBERNETES.DOCUMENT_SEPARATOR)
    .map((document) => document.trim())
    .filter((document) => document !== '')
}

/**
 * Extracts a validated (kind, name, namespace) triple from one document.
 * The kind is returned lowercased, ready to be used as a resource type.
 */
export function extractIdentity(
  document: string,
  defaultNamespace: string
): ResourceIdentity | undefined {
  const kindMatch = KIND_PATTERN.exec(document)
  const nameMatch = NAME_PATTERN.exec(document)
  if (!kindMatch || !nameMatch) {
    return undefined
  }

  const kind = kindMatch[1].toLowerCase()
  const name = unquote(nameMatch[1])
  if (!isValidKubernetesName(kind) || !isValidKubernetesName(name)) {
    return undefined
  }

  let namespace = defaultNamespace || KUBERNETES.DEFAULT_NAMESPACE
  const namespaceMatch = NAMESPACE_PATTERN.exec(document)
  if (namespaceMatch) {
    namespace = unquote(namespaceMatch[1])
    if (!isValidKubernetesName(namespace)) {
      namespace = KUBERNETES.DEFAULT_NAMESPACE
    }
  }

  return { kind, name, namespace }
}

/**
 * Checks a string against the resource name rules: at most 253 lowercase
 * alphanumerics, `-` or `.`, starting and ending with an alphanumeric.
 */
export function isValidKubernetesName(name: string): boolean {
  if (name.length === 0 || name.length > KUBERNETES.MAX_NAME_LENGTH) {
    return false
  }
  return /^[a-z0-9]([a-z0-9.-]*[a-z0-9])?$/.test(name)
}

function unquote(value: string): string {
  return value.replace(/^(["'])(.*)\1$/, '$2')
}
