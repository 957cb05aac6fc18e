import { describe, it, expect } from 'vitest';
import {
  DocumentShapeError,
  defaultEmail,
  findManagedInbound,
  hasUser,
  listUsers,
  parseDocument,
  serializeDocument,
  withUserAdded,
  withUserRemoved,
  withUserReplaced,
} from '../../src/xray/XrayConfigDocument.js';
import { UUID_A, UUID_B, UUID_C, sampleDocument } from '../helpers/fixtures.js';

describe('XrayConfigDocument', () => {
  describe('parseDocument', () => {
    it('rejects a document that is not an object', () => {
      expect(() => parseDocument('[1, 2]')).toThrow(DocumentShapeError);
    });

    it('throws a SyntaxError on invalid JSON', () => {
      expect(() => parseDocument('{"inbounds": [')).toThrow(SyntaxError);
    });

    it('serializes with two-space indent and a trailing newline', () => {
      expect(serializeDocument({ a: 1 })).toBe('{\n  "a": 1\n}\n');
    });
  });

  describe('findManagedInbound', () => {
    it('picks the first vless inbound when no tag is given', () => {
      expect(findManagedInbound(sampleDocument()).tag).toBe('vless-in');
    });

    it('picks the inbound by tag', () => {
      expect(findManagedInbound(sampleDocument(), { tag: 'api' }).protocol).toBe('dokodemo-door');
    });

    it('throws when the tag is missing', () => {
      expect(() => findManagedInbound(sampleDocument(), { tag: 'nope' })).toThrow('Inbound with tag "nope" not found');
    });

    it('throws when there are no inbounds', () => {
      expect(() => findManagedInbound({ outbounds: [] })).toThrow('Configuration has no inbounds array');
    });
  });

  describe('withUserAdded', () => {
    it('appends a client with the default email and flow', () => {
      const doc = sampleDocument();
      const { document, changed } = withUserAdded(doc, { uuid: UUID_A, flow: 'xtls-rprx-vision' });

      expect(changed).toBe(true);
      expect(listUsers(document)).toEqual([
        { id: UUID_A, email: 'user-3f2504e0', flow: 'xtls-rprx-vision' },
      ]);
    });

    it('leaves the input document untouched', () => {
      const doc = sampleDocument();
      withUserAdded(doc, { uuid: UUID_A, email: 'a@example.com' });

      expect(listUsers(doc)).toEqual([]);
    });

    it('is a no-op for a user that already exists', () => {
      const doc = sampleDocument([{ id: UUID_A, email: 'a@example.com' }]);
      const result = withUserAdded(doc, { uuid: UUID_A, email: 'other@example.com' });

      expect(result.changed).toBe(false);
      expect(result.document).toBe(doc);
    });

    it('drops another client that holds the same email', () => {
      const doc = sampleDocument([{ id: UUID_B, email: 'shared@example.com' }]);
      const { document } = withUserAdded(doc, { uuid: UUID_A, email: 'shared@example.com' });

      expect(listUsers(document).map((user) => user.id)).toEqual([UUID_A]);
    });

    it('preserves every field outside the clients array', () => {
      const doc = sampleDocument();
      const { document } = withUserAdded(doc, { uuid: UUID_A });

      const strip = (value: typeof doc) => {
        const copy = structuredClone(value);
        const inbound = findManagedInbound(copy);
        inbound.settings = { decryption: 'none' };
        return copy;
      };
      expect(strip(document)).toEqual(strip(doc));
    });

    it('creates the settings object when the inbound has none', () => {
      const doc = { inbounds: [{ tag: 'bare', protocol: 'vless' }] };
      const { document } = withUserAdded(doc, { uuid: UUID_A, email: 'a@example.com' });

      expect(findManagedInbound(document).settings).toEqual({
        clients: [{ id: UUID_A, email: 'a@example.com' }],
      });
    });
  });

  describe('withUserRemoved', () => {
    it('removes only the matching client', () => {
      const doc = sampleDocument([
        { id: UUID_A, email: 'a@example.com' },
        { id: UUID_B, email: 'b@example.com' },
      ]);
      const { document, changed } = withUserRemoved(doc, UUID_A);

      expect(changed).toBe(true);
      expect(hasUser(document, UUID_A)).toBe(false);
      expect(hasUser(document, UUID_B)).toBe(true);
    });

    it('is a no-op for an absent user', () => {
      const doc = sampleDocument();
      const result = withUserRemoved(doc, UUID_A);

      expect(result.changed).toBe(false);
      expect(result.document).toBe(doc);
    });
  });

  describe('withUserReplaced', () => {
    it('swaps the old user for the new one and keeps the others', () => {
      const doc = sampleDocument([
        { id: UUID_A, email: 'a@example.com' },
        { id: UUID_C, email: 'c@example.com' },
      ]);
      const { document, changed } = withUserReplaced(doc, UUID_A, { uuid: UUID_B, email: 'b@example.com' });

      expect(changed).toBe(true);
      expect(listUsers(document)).toEqual([
        { id: UUID_C, email: 'c@example.com' },
        { id: UUID_B, email: 'b@example.com' },
      ]);
      expect(listUsers(doc)).toHaveLength(2);
    });

    it('is a no-op once the swap is in effect', () => {
      const doc = sampleDocument([{ id: UUID_B, email: 'b@example.com' }]);
      const result = withUserReplaced(doc, UUID_A, { uuid: UUID_B });

      expect(result.changed).toBe(false);
      expect(result.document).toBe(doc);
    });
  });

  it('builds the default email from the first eight uuid characters', () => {
    expect(defaultEmail(UUID_B)).toBe('user-9b2c7a10');
  });
});
