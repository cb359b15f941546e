// Tests for the entity manager and repositories

import { describe, it, expect, expectTypeOf, beforeEach } from 'vitest';
import { z } from 'zod';
import * as Y from 'yjs';
import { createInMemoryDocument, createYjsDocument, type InMemoryDocument } from '@docmap/documents';
import { EntityManager, createEntityManager } from './entity-manager.js';
import { EntityRegistry } from '../registry/index.js';
import { defineEmbeddable, defineEntity } from '../schema/define.js';
import { createCapturingLogger } from '../logger.js';
import {
  ConflictingSchemaError,
  InvalidDescriptorError,
  InvalidIdentityError,
  NodeNotFoundError,
  TypeMismatchError,
  UnregisteredTypeError,
} from '../errors.js';

// --- Test Fixtures ---

const U1 = '0b7e3c52-5d0f-4a51-9c64-2f4b7a3d9e10';
const U2 = '6f1d2a8e-93b4-4c07-8e25-d1a0c3b5f742';

const Contact = defineEntity({
  name: 'Contact',
  collection: 'contacts',
  identity: 'id',
  fields: {
    id: z.string().uuid(),
    name: z.string(),
    email: z.string().email().optional(),
  },
});

const Address = defineEmbeddable({
  name: 'Address',
  fields: { street: z.string() },
});

const Customer = defineEntity({
  name: 'Customer',
  identity: 'id',
  fields: { id: z.string().uuid(), name: z.string() },
});

const Tag = defineEntity({
  name: 'Tag',
  identity: 'slug',
  fields: { slug: z.string(), label: z.string() },
});

const Order = defineEntity({
  name: 'Order',
  collection: 'orders',
  identity: 'id',
  fields: {
    id: z.string().uuid(),
    customer: Customer.schema,
    tags: z.array(Tag.schema),
    crew: z.record(Customer.schema),
  },
});

const MemberId = z.string().uuid().brand<'MemberId'>();
type MemberId = z.infer<typeof MemberId>;

const InvoiceId = z.string().uuid().brand<'InvoiceId'>();
type InvoiceId = z.infer<typeof InvoiceId>;

const Member = defineEntity({
  name: 'Member',
  identity: 'id',
  fields: { id: MemberId, name: z.string() },
});

// --- Tests ---

describe('EntityManager', () => {
  let registry: EntityRegistry;
  let doc: InMemoryDocument;
  let manager: EntityManager;

  beforeEach(() => {
    registry = new EntityRegistry();
    doc = createInMemoryDocument();
    manager = createEntityManager(doc, { registry });
  });

  it('should save, find, list and delete a contact', () => {
    registry.register(Contact);
    const contacts = manager.repository(Contact);

    contacts.save({ id: U1, name: 'ringo' });

    expect(contacts.find(U1)).toEqual({ id: U1, name: 'ringo' });
    expect(Array.from(contacts.all())).toHaveLength(1);

    contacts.delete(U1);

    expect(contacts.find(U1)).toBeNull();
    expect(() => contacts.delete(U1)).toThrow(NodeNotFoundError);
  });

  it('should expose its document and registry', () => {
    expect(manager.document).toBe(doc);
    expect(manager.registry).toBe(registry);
  });

  describe('repository', () => {
    it('should fail for unregistered types and succeed once registered', () => {
      expect(() => manager.repository(Contact)).toThrow(UnregisteredTypeError);

      registry.register(Contact);

      expect(manager.repository(Contact).descriptor).toEqual(Contact.descriptor);
    });

    it('should fail when the registry holds a different shape', () => {
      registry.register({ ...Contact.descriptor, collection: ['people'] });

      expect(() => manager.repository(Contact)).toThrow(ConflictingSchemaError);
    });

    it('should refuse embeddable types', () => {
      registry.register(Address);

      expect(() => manager.repository('Address')).toThrow(InvalidDescriptorError);
    });

    it('should return untyped records for a type id', () => {
      registry.register(Contact.descriptor);
      doc.put(['contacts', U1], { name: 'ringo', email: 'not-an-email' });

      expect(manager.repository('Contact').find(U1)).toEqual({
        id: U1,
        name: 'ringo',
        email: 'not-an-email',
      });
    });

    it('should log repository creation, saves and deletes', () => {
      const logger = createCapturingLogger();
      registry.register(Contact);
      const contacts = new EntityManager(doc, { registry, logger }).repository(Contact);

      contacts.save({ id: U1, name: 'ringo' });
      contacts.delete(U1);

      expect(logger.entries.map((e) => [e.level, e.message, e.data])).toEqual([
        ['debug', 'Created repository', { typeId: 'Contact', collection: 'contacts' }],
        ['debug', 'Saved entity', { typeId: 'Contact', key: U1 }],
        ['debug', 'Deleted entity', { typeId: 'Contact', key: U1 }],
      ]);
    });
  });

  describe('EntityRepository', () => {
    beforeEach(() => {
      registry.register(Contact);
    });

    it('should return null for absent identities', () => {
      expect(manager.repository(Contact).find(U2)).toBeNull();
      expect(manager.repository(Contact).exists(U2)).toBe(false);
    });

    it('should fail when a stored value is rejected by the schema', () => {
      doc.put(['contacts', U1], { name: 'ringo', email: 'not-an-email' });

      try {
        manager.repository(Contact).find(U1);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TypeMismatchError);
        expect((error as TypeMismatchError).path).toEqual(['contacts', U1, 'email']);
      }
    });

    it('should not write instances the schema rejects', () => {
      const contacts = manager.repository(Contact);

      expect(() => contacts.save({ id: U1, name: 'ringo', email: 'not-an-email' })).toThrow(TypeMismatchError);
      expect(doc.snapshot()).toEqual({});
    });

    it('should reject identities that cannot be map keys', () => {
      const contacts = manager.repository(Contact);

      expect(() => contacts.save({ id: 'c-1', name: 'ringo' })).toThrow(InvalidIdentityError);
      expect(() => contacts.find('c-1')).toThrow(InvalidIdentityError);
    });

    it('should list keys in document order and findAll in key order', () => {
      const contacts = manager.repository(Contact);
      contacts.save({ id: U2, name: 'paul' });
      contacts.save({ id: U1, name: 'ringo' });

      expect(contacts.keys()).toEqual([U2, U1]);
      expect(Array.from(contacts.findAll().keys())).toEqual([U1, U2]);
      expect(contacts.findAll().get(U2)).toEqual({ id: U2, name: 'paul' });
    });

    it('should list keys when all() is first pulled', () => {
      const contacts = manager.repository(Contact);
      contacts.save({ id: U1, name: 'ringo' });

      const pending = contacts.all();
      contacts.save({ id: U2, name: 'paul' });

      expect(Array.from(pending).map((c) => c.name)).toEqual(['ringo', 'paul']);
      expect(Array.from(pending)).toEqual([]);
      expect(Array.from(contacts.all())).toHaveLength(2);
    });

    it('should order integer keys numerically in findAll', () => {
      const Invoice = defineEntity({
        name: 'Invoice',
        identity: 'number',
        fields: { number: z.number().int(), total: z.number() },
      });
      registry.register(Invoice);
      const invoices = manager.repository(Invoice);

      invoices.save({ number: 10, total: 5 });
      invoices.save({ number: 9, total: 3 });

      expect(Array.from(invoices.findAll().keys())).toEqual(['9', '10']);
      expect(invoices.find(9)).toEqual({ number: 9, total: 3 });
      expect(doc.listKeys(['invoice'])).toEqual(['10', '9']);
    });

    it('should update in place and keep unknown keys', () => {
      const contacts = manager.repository(Contact);
      doc.put(['contacts', U1], { name: 'ritchie', nickname: 'ringo' });

      contacts.save({ id: U1, name: 'ringo', email: 'ringo@example.com' });

      expect(doc.get(['contacts', U1])).toEqual({
        name: 'ringo',
        nickname: 'ringo',
        email: 'ringo@example.com',
      });
    });

    it('should return the key of an instance', () => {
      expect(manager.repository(Contact).keyOf({ id: U1.toUpperCase(), name: 'ringo' })).toBe(U1);
    });
  });

  describe('nested entities', () => {
    beforeEach(() => {
      registry.register(Order);
    });

    it('should round trip entities nested in fields, lists and records', () => {
      const orders = manager.repository(Order);
      const order = {
        id: U1,
        customer: { id: U2, name: 'ringo' },
        tags: [{ slug: 'music', label: 'Music' }],
        crew: { drums: { id: U2, name: 'ringo' } },
      };

      orders.save(order);

      expect(orders.find(U1)).toEqual(order);
      expect(doc.get(['orders', U1])).toEqual({
        customer: { id: U2, name: 'ringo' },
        tags: [{ slug: 'music', label: 'Music' }],
        crew: { drums: { id: U2, name: 'ringo' } },
      });
    });

    it('should register the nested types', () => {
      expect(registry.list().map((d) => d.typeId)).toEqual(['Customer', 'Tag', 'Order']);
    });
  });

  describe('uuid keys stored in uppercase', () => {
    const UPPER = U1.toUpperCase();

    beforeEach(() => {
      registry.register(Contact);
      doc.put(['contacts', UPPER], { name: 'ringo' });
    });

    it('should hydrate the identity exactly as stored', () => {
      expect(Array.from(manager.repository(Contact).all())).toEqual([{ id: UPPER, name: 'ringo' }]);
    });

    it('should find the node by either spelling', () => {
      const contacts = manager.repository(Contact);

      expect(contacts.find(UPPER)).toEqual({ id: UPPER, name: 'ringo' });
      expect(contacts.find(U1)).toEqual({ id: UPPER, name: 'ringo' });
      expect(contacts.exists(U1)).toBe(true);
      expect(contacts.keyOf({ id: U1, name: 'ringo' })).toBe(UPPER);
    });

    it('should update the stored node instead of adding a second one', () => {
      const contacts = manager.repository(Contact);

      for (const contact of contacts.all()) {
        contacts.save({ ...contact, name: 'starr' });
      }

      expect(contacts.keys()).toEqual([UPPER]);
      expect(Array.from(contacts.all())).toEqual([{ id: UPPER, name: 'starr' }]);
    });

    it('should delete the stored node', () => {
      const contacts = manager.repository(Contact);

      contacts.delete(U1);

      expect(contacts.keys()).toEqual([]);
    });
  });

  describe('typed identities', () => {
    beforeEach(() => {
      registry.register(Contact);
      registry.register(Member);
    });

    it('should take identities of the identity property type', () => {
      const members = manager.repository(Member);

      expectTypeOf(members.find).parameter(0).toEqualTypeOf<MemberId>();
      expectTypeOf(manager.repository(Contact).find).parameter(0).toEqualTypeOf<string>();
      expectTypeOf(manager.repository('Member').find).parameter(0).toEqualTypeOf<string | number>();
      expectTypeOf<InvoiceId>().not.toMatchTypeOf<MemberId>();
    });

    it('should store branded identities as plain keys', () => {
      const members = manager.repository(Member);
      const id = MemberId.parse(U1);

      members.save({ id, name: 'ringo' });

      expect(members.descriptor.identity).toEqual({ field: 'id', codec: 'uuid' });
      expect(members.find(id)).toEqual({ id: U1, name: 'ringo' });
      expect(members.keys()).toEqual([U1]);
    });
  });

  describe('over a Yjs document', () => {
    it('should make saved entities visible to a synced peer', () => {
      registry.register(Contact);
      const left = new Y.Doc();
      const right = new Y.Doc();
      const leftContacts = new EntityManager(createYjsDocument(left), { registry }).repository(Contact);
      const rightContacts = new EntityManager(createYjsDocument(right), { registry }).repository(Contact);

      leftContacts.save({ id: U1, name: 'ringo' });
      Y.applyUpdate(right, Y.encodeStateAsUpdate(left));

      expect(rightContacts.find(U1)).toEqual({ id: U1, name: 'ringo' });
    });
  });
});
