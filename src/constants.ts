/**
 * Application-wide constants used across different modules.
 */

/**
 * Coordinates of the custom resources that hold the recorded history
 */
export const RECORDS = {
  GROUP: 'chronicle.dev',
  VERSION: 'v1alpha1',

  SNAPSHOT_KIND: 'ChronicleSnapshot',
  SNAPSHOT_PLURAL: 'chroniclesnapshots',

  HISTORY_KIND: 'ChronicleHistory',
  HISTORY_PLURAL: 'chroniclehistories',

  /**
   * Name prefixes. Timeline labels are derived from the `delete` and `patch`
   * prefixes of a history's snapshot reference.
   */
  SNAPSHOT_PREFIX: 'chronicle-snapshot',
  HISTORY_PREFIX: 'chronicle-history',
  DELETE_REF_PREFIX: 'delete',
  PATCH_REF_PREFIX: 'patch',

  /**
   * Applier identity recorded when the OS user cannot be determined
   */
  UNKNOWN_USER: 'unknown'
} as const

/**
 * Kubernetes manifest constants
 */
export const KUBERNETES = {
  /**
   * Default namespace used when a Kubernetes object doesn't specify one
   */
  DEFAULT_NAMESPACE: 'default',

  /**
   * YAML document separator used to split multi-document files
   */
  DOCUMENT_SEPARATOR: /^---[ \t]*$/m,

  /**
   * Separator inserted when documents are joined back together
   */
  DOCUMENT_JOINER: '\n---\n',

  /**
   * Context and server the client library fills in when it finds no
   * kubeconfig at all
   */
  FALLBACK_CONTEXT: 'loaded-context',
  FALLBACK_SERVER: 'http://localhost:8080',

  /**
   * Maximum length of a resource name (DNS subdomain)
   */
  MAX_NAME_LENGTH: 253,

  /**
   * Server-managed fields dropped before two documents are compared
   */
  VOLATILE_METADATA_FIELDS: [
    'creationTimestamp',
    'resourceVersion',
    'uid',
    'generation',
    'managedFields',
    'annotations'
  ],

  /**
   * API-group suffixes stripped from resource types for display.
   * Longer groups come first so `.v1` never eats part of them.
   */
  API_GROUP_SUFFIXES: [
    '.apiextensions.k8s.io',
    '.rbac.authorization.k8s.io',
    '.networking.k8s.io',
    '.storage.k8s.io',
    '.batch',
    '.apps',
    '.v1'
  ]
} as const

/**
 * kubectl invocation constants
 */
export const KUBECTL = {
  /**
   * Environment variable that overrides the kubectl binary
   */
  BINARY_ENV: 'KUBECTL',
  DEFAULT_BINARY: 'kubectl',

  PATCH_TYPES: ['strategic', 'merge', 'json'],
  DEFAULT_PATCH_TYPE: 'strategic'
} as const

/**
 * Timeline table layout
 */
export const TIMELINE = {
  COLUMN_WIDTHS: {
    index: 3,
    time: 20,
    operation: 15,
    created: 35,
    modified: 35,
    deleted: 35,
    snapshot: 30
  },
  RULE_WIDTH: 173,

  /**
   * Resource lists longer than MAX_CELL_LENGTH are cut to TRUNCATE_AT
   * characters followed by an ellipsis
   */
  MAX_CELL_LENGTH: 33,
  TRUNCATE_AT: 30
} as const

/**
 * Messages written to the records
 */
export const MESSAGES = {
  HISTORY_SUMMARY: 'Successfully applied manifests',
  SNAPSHOT_COMPLETED: 'Successfully applied and recorded',
  SNAPSHOT_NO_CHANGES: 'No changes detected, snapshot not needed'
} as const
