import { describe, test, expect } from 'vitest';
import { createCatalog, type Column, type ForeignKeyConstraint, type Table } from './model';
import { matchReference, resolveRelationships } from './relationshipResolver';

function table(schema: string, name: string, columns: string[], primaryKey: string[] = ['id']): Table {
  const cols: Column[] = columns.map((c, i) => ({
    name: c,
    type: 'INTEGER',
    nativeType: 'NUMBER(38,0)',
    isNullable: !primaryKey.includes(c),
    ordinalPosition: i + 1,
    isPrimaryKey: primaryKey.includes(c),
  }));
  return { schema, name, qualifiedName: `${schema}.${name}`, kind: 'TABLE', columns: cols, primaryKey };
}

function fk(source: string, sourceColumns: string[], target: string, targetColumns: string[], name?: string): ForeignKeyConstraint {
  return { ...(name ? { name } : {}), sourceTable: source, sourceColumns, targetTable: target, targetColumns };
}

const customers = table('sales', 'customers', ['id', 'name']);
const orders = table('sales', 'orders', ['id', 'customer_id', 'total']);

describe('resolveRelationships', () => {
  test('infers a reference from a column name', () => {
    const relationships = resolveRelationships(createCatalog([customers, orders]));

    expect(relationships).toEqual([
      {
        sourceTable: 'sales.orders',
        sourceColumn: 'customer_id',
        targetTable: 'sales.customers',
        targetColumn: 'id',
        origin: 'INFERRED',
        cardinality: 'ONE_TO_MANY',
      },
    ]);
  });

  test('infers from singular table names', () => {
    const customer = table('shop', 'customer', ['id']);
    const order = table('shop', 'order', ['id', 'customer_id']);

    expect(resolveRelationships(createCatalog([order, customer])).map(r => `${r.sourceTable}.${r.sourceColumn} -> ${r.targetTable}.${r.targetColumn} ${r.origin}`))
      .toEqual(['shop.order.customer_id -> shop.customer.id INFERRED']);
  });

  test('skips inference when disabled', () => {
    expect(resolveRelationships(createCatalog([customers, orders]), { infer: false })).toEqual([]);
  });

  test('keeps explicit self-references', () => {
    const employees = table('hr', 'employees', ['id', 'manager_id']);
    const catalog = createCatalog([employees], [fk('hr.employees', ['manager_id'], 'hr.employees', ['id'])]);

    expect(resolveRelationships(catalog)).toEqual([
      {
        sourceTable: 'hr.employees',
        sourceColumn: 'manager_id',
        targetTable: 'hr.employees',
        targetColumn: 'id',
        origin: 'EXPLICIT',
        cardinality: 'ONE_TO_MANY',
      },
    ]);
  });

  test('does not infer between tables already linked by a foreign key', () => {
    const invoices = table('sales', 'invoices', ['id', 'customer_id', 'payer']);
    const catalog = createCatalog([customers, invoices], [fk('sales.invoices', ['payer'], 'sales.customers', ['id'])]);

    const relationships = resolveRelationships(catalog);

    expect(relationships.map(r => [r.sourceColumn, r.origin])).toEqual([['payer', 'EXPLICIT']]);
  });

  test('drops duplicate relationships', () => {
    const catalog = createCatalog([customers, orders], [
      fk('sales.orders', ['customer_id'], 'sales.customers', ['id'], 'FK_A'),
      fk('SALES.ORDERS', ['CUSTOMER_ID'], 'SALES.CUSTOMERS', ['ID'], 'FK_B'),
    ]);

    const relationships = resolveRelationships(catalog);

    expect(relationships).toHaveLength(1);
    expect(relationships[0].origin).toBe('EXPLICIT');
  });

  test('splits composite foreign keys per column pair', () => {
    const items = table('sales', 'order_items', ['order_id', 'line_no', 'amount'], ['order_id', 'line_no']);
    const shipments = table('sales', 'shipments', ['id', 'order_id', 'line_no']);
    const catalog = createCatalog([items, shipments], [
      fk('sales.shipments', ['order_id', 'line_no'], 'sales.order_items', ['order_id', 'line_no'], 'FK_LINE'),
    ]);

    expect(resolveRelationships(catalog).map(r => `${r.sourceColumn}->${r.targetColumn} ${r.origin}`)).toEqual([
      'order_id->order_id EXPLICIT',
      'line_no->line_no EXPLICIT',
    ]);
  });

  test('marks a reference that is the whole primary key as one-to-one', () => {
    const profiles = table('sales', 'customer_profiles', ['customer_id', 'bio'], ['customer_id']);

    const relationships = resolveRelationships(createCatalog([customers, profiles]));

    expect(relationships.map(r => [r.sourceTable, r.sourceColumn, r.targetColumn, r.cardinality])).toEqual([
      ['sales.customer_profiles', 'customer_id', 'id', 'ONE_TO_ONE'],
    ]);
  });

  test('only infers within one schema', () => {
    const archived = table('archive', 'orders', ['id', 'customer_id']);

    expect(resolveRelationships(createCatalog([customers, archived]))).toEqual([]);
  });

  test('uses configured suffixes', () => {
    const invoices = table('sales', 'invoices', ['id', 'customer_key']);

    expect(resolveRelationships(createCatalog([customers, invoices]))).toEqual([]);
    expect(resolveRelationships(createCatalog([customers, invoices]), { suffixes: ['_key'] }).map(r => r.sourceColumn))
      .toEqual(['customer_key']);
  });
});

describe('matchReference', () => {
  const column = (name: string): Column => ({
    name,
    type: 'INTEGER',
    nativeType: 'NUMBER(38,0)',
    isNullable: true,
    ordinalPosition: 1,
    isPrimaryKey: false,
  });

  test('prefers a same-named target column', () => {
    const target = table('sales', 'customers', ['customer_id', 'name'], ['customer_id']);

    expect(matchReference(column('CUSTOMER_ID'), target, ['_id'])).toEqual({
      sourceColumn: 'CUSTOMER_ID',
      targetColumn: 'customer_id',
    });
  });

  test('matches the unsingularized table name', () => {
    const target = table('sales', 'news', ['id']);

    expect(matchReference(column('news_id'), target, ['_id'])).toEqual({ sourceColumn: 'news_id', targetColumn: 'id' });
  });

  test('needs a single-column primary key otherwise', () => {
    const target = table('sales', 'order_items', ['order_id', 'line_no'], ['order_id', 'line_no']);

    expect(matchReference(column('order_item_id'), target, ['_id'])).toBeUndefined();
    expect(matchReference(column('total'), customers, ['_id'])).toBeUndefined();
  });
});
