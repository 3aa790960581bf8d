import { describe, it, expect } from 'vitest';
import { EntityRegistry } from '../src/core/entities/registry.js';
import { InvalidRegistryEntryError, UnknownEntityError } from '../src/core/api/errors.js';
import { bundledRegistry, widgetEntry } from './helpers.js';

describe('EntityRegistry', () => {
  const registry = bundledRegistry();

  it('loads every bundled entity', () => {
    expect(registry.keys()).toEqual([
      'contract', 'company', 'attachment', 'contact', 'employee', 'customer', 'contract_type',
    ]);
  });

  it('looks up descriptors by key', () => {
    const contract = registry.lookup('contract');
    expect(contract.resourcePath).toBe('/contract');
    expect(contract.keyPlural).toBe('contracts');
    expect(contract.searchFields).toEqual(['contract_title1', 'company_name']);
    expect(contract.linkedFields.has('company_name')).toBe(true);
  });

  it('fails UnknownEntity for keys not in the table', () => {
    expect(() => registry.lookup('widget')).toThrow(UnknownEntityError);
    try {
      registry.lookup('widget');
    } catch (err) {
      expect(err).toMatchObject({ kind: 'UnknownEntity', context: { entity: 'widget' } });
    }
  });

  it('reports capability per entity', () => {
    expect(registry.supports('contract', 'evaluateFormat')).toBe(true);
    expect(registry.supports('employee', 'attachFile')).toBe(false);
    expect(registry.supports('nope', 'get')).toBe(false);
  });

  it('freezes descriptors', () => {
    expect(Object.isFrozen(registry.lookup('company'))).toBe(true);
  });

  it('defaults operations to the full set', () => {
    const r = new EntityRegistry([widgetEntry()]);
    expect(r.lookup('widget').operations.size).toBe(12);
  });

  it('rejects linked fields missing from keyFields', () => {
    expect(() => new EntityRegistry([widgetEntry({ linkedFields: ['vendor'] })])).toThrow(
      "Invalid registry entry 'widget': linked field(s) not declared in keyFields: vendor",
    );
  });

  it('rejects required and search fields missing from keyFields', () => {
    expect(() => new EntityRegistry([widgetEntry({ requiredFields: ['size'] })])).toThrow(InvalidRegistryEntryError);
    expect(() => new EntityRegistry([widgetEntry({ searchFields: ['colour'] })])).toThrow(InvalidRegistryEntryError);
  });

  it('rejects unknown operations', () => {
    expect(() => new EntityRegistry([widgetEntry({ operations: ['get', 'frobnicate'] })])).toThrow(
      "Invalid registry entry 'widget': unknown operation 'frobnicate'",
    );
  });

  it('rejects duplicate keys', () => {
    expect(() => new EntityRegistry([widgetEntry(), widgetEntry()])).toThrow(
      "Invalid registry entry 'widget': duplicate entity key",
    );
  });
});
