export type Identifier = string; // canonical lowercase UUID
export type Namespace = string;
export type ResourceType = string;

/** Raw JSON text of a document. The service never looks inside it. */
export type JsonText = string;

// Key half of an address: either a concrete row or a request for a new one
export type ResourceKey =
  | { kind: 'allocate' }
  | { kind: 'concrete'; identifier: Identifier };

export interface ResourceAddress {
  namespace: Namespace;
  resourceType: ResourceType;
  key: ResourceKey;
}

export interface StoredDocument {
  identifier: Identifier;
  // null while the identifier is reserved but nothing has been written yet
  body: JsonText | null;
}
