import type { ProxyUser } from '@xray-agent/protocol';

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** The whole proxy configuration document, kept as parsed JSON. */
export type XrayConfigDocument = JsonObject;

export interface InboundSelector {
  /** Managed inbound tag; the first `vless` inbound when unset. */
  tag?: string;
}

export interface AddUserInput {
  uuid: string;
  email?: string;
  flow?: string;
}

export interface MutationResult {
  document: XrayConfigDocument;
  changed: boolean;
}

export class DocumentShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DocumentShapeError';
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseDocument(raw: string): XrayConfigDocument {
  const parsed: JsonValue = JSON.parse(raw);
  if (!isJsonObject(parsed)) {
    throw new DocumentShapeError('Configuration document must be a JSON object');
  }
  return parsed;
}

export function serializeDocument(doc: XrayConfigDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

export function defaultEmail(uuid: string): string {
  return `user-${uuid.slice(0, 8)}`;
}

/**
 * Locate the inbound whose clients list the agent manages. Throws when the
 * document has none.
 */
export function findManagedInbound(doc: XrayConfigDocument, selector: InboundSelector = {}): JsonObject {
  const inbounds = doc.inbounds;
  if (!Array.isArray(inbounds)) {
    throw new DocumentShapeError('Configuration has no inbounds array');
  }

  for (const inbound of inbounds) {
    if (!isJsonObject(inbound)) continue;
    const matches = selector.tag ? inbound.tag === selector.tag : inbound.protocol === 'vless';
    if (matches) return inbound;
  }

  throw new DocumentShapeError(
    selector.tag ? `Inbound with tag "${selector.tag}" not found` : 'VLESS inbound not found'
  );
}

export function listUsers(doc: XrayConfigDocument, selector: InboundSelector = {}): ProxyUser[] {
  return readClients(findManagedInbound(doc, selector)).flatMap((client) => {
    if (!isJsonObject(client) || typeof client.id !== 'string') return [];
    const user: ProxyUser = { id: client.id };
    if (typeof client.email === 'string') user.email = client.email;
    if (typeof client.flow === 'string') user.flow = client.flow;
    return [user];
  });
}

export function hasUser(doc: XrayConfigDocument, uuid: string, selector: InboundSelector = {}): boolean {
  return listUsers(doc, selector).some((user) => user.id === uuid);
}

/**
 * Return a copy of `doc` with the user appended to the managed inbound.
 * A user that is already present leaves the document untouched. Other
 * clients sharing the new user's email are dropped, since the proxy
 * rejects duplicate emails. Nothing outside the clients array changes.
 */
export function withUserAdded(
  doc: XrayConfigDocument,
  input: AddUserInput,
  selector: InboundSelector = {}
): MutationResult {
  if (hasUser(doc, input.uuid, selector)) {
    return { document: doc, changed: false };
  }

  const document = structuredClone(doc);
  const inbound = findManagedInbound(document, selector);
  const email = input.email || defaultEmail(input.uuid);

  const clients = readClients(inbound).filter(
    (client) => !(isJsonObject(client) && client.email === email && client.id !== input.uuid)
  );

  const entry: JsonObject = { id: input.uuid, email };
  if (input.flow) entry.flow = input.flow;
  clients.push(entry);

  writeClients(inbound, clients);
  return { document, changed: true };
}

/** Return a copy of `doc` without the user; absent users are a no-op. */
export function withUserRemoved(
  doc: XrayConfigDocument,
  uuid: string,
  selector: InboundSelector = {}
): MutationResult {
  if (!hasUser(doc, uuid, selector)) {
    return { document: doc, changed: false };
  }

  const document = structuredClone(doc);
  const inbound = findManagedInbound(document, selector);
  const clients = readClients(inbound).filter((client) => !(isJsonObject(client) && client.id === uuid));

  writeClients(inbound, clients);
  return { document, changed: true };
}

/**
 * Swap `previousUuid` for a new user in a single candidate. Already in
 * effect when the old user is gone and the new one is present.
 */
export function withUserReplaced(
  doc: XrayConfigDocument,
  previousUuid: string,
  input: AddUserInput,
  selector: InboundSelector = {}
): MutationResult {
  const removed = withUserRemoved(doc, previousUuid, selector);
  const added = withUserAdded(removed.document, input, selector);
  return { document: added.document, changed: removed.changed || added.changed };
}

function readClients(inbound: JsonObject): JsonValue[] {
  const settings = inbound.settings;
  if (!isJsonObject(settings)) return [];
  const clients = settings.clients;
  return Array.isArray(clients) ? [...clients] : [];
}

function writeClients(inbound: JsonObject, clients: JsonValue[]): void {
  const settings = inbound.settings;
  if (isJsonObject(settings)) {
    settings.clients = clients;
  } else {
    inbound.settings = { clients };
  }
}
