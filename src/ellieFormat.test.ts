import { describe, test, expect } from 'vitest';
import type { ModelDocument } from './model';
import { fromEllieModel, parseFolderId, toEllieModel } from './ellieFormat';
import { TransferError } from './errors';

const document: ModelDocument = {
  entities: [
    {
      id: 'e-customers',
      name: 'CUSTOMERS',
      kind: 'TABLE',
      attributes: [
        { name: 'ID', type: 'INTEGER', nativeType: 'NUMBER(38,0)', isNullable: false, isPrimaryKey: true, isForeignKey: false },
      ],
    },
    {
      id: 'e-orders',
      name: 'ORDERS',
      kind: 'VIEW',
      attributes: [
        { name: 'ID', type: 'INTEGER', nativeType: 'NUMBER(38,0)', isNullable: false, isPrimaryKey: true, isForeignKey: false },
        { name: 'CUSTOMER_ID', type: 'INTEGER', nativeType: 'NUMBER(38,0)', isNullable: true, isPrimaryKey: false, isForeignKey: true },
      ],
    },
  ],
  relationships: [
    {
      sourceEntityId: 'e-orders',
      sourceAttribute: 'CUSTOMER_ID',
      targetEntityId: 'e-customers',
      targetAttribute: 'ID',
      origin: 'INFERRED',
      cardinality: 'ONE_TO_MANY',
    },
  ],
};

describe('toEllieModel', () => {
  test('writes entities and relationships in Ellie form', () => {
    expect(toEllieModel(document, { name: 'Sales', level: 'logical', folderId: '42' })).toEqual({
      model: {
        name: 'Sales',
        level: 'logical',
        folderId: 42,
        entities: [
          {
            id: 'e-customers',
            name: 'CUSTOMERS',
            attributes: [{ name: 'ID', metadata: { PK: true, FK: false, 'DATA TYPE': 'NUMBER(38,0)' } }],
          },
          {
            id: 'e-orders',
            name: 'ORDERS',
            attributes: [
              { name: 'ID', metadata: { PK: true, FK: false, 'DATA TYPE': 'NUMBER(38,0)' } },
              { name: 'CUSTOMER_ID', metadata: { PK: false, FK: true, 'DATA TYPE': 'NUMBER(38,0)' } },
            ],
          },
        ],
        relationships: [
          {
            sourceEntity: { id: 'e-customers', name: 'CUSTOMERS', startType: 'one', attributeNames: ['ID'] },
            targetEntity: { id: 'e-orders', name: 'ORDERS', endType: 'many', attributeNames: ['CUSTOMER_ID'] },
            description: [],
          },
        ],
      },
    });
  });

  test('leaves out the folder when none is given', () => {
    const payload = toEllieModel(document, { name: 'Sales', level: 'physical' });

    expect(Object.keys(payload.model)).toEqual(['name', 'level', 'entities', 'relationships']);
  });

  test('writes one-to-one relationships with a single end', () => {
    const oneToOne: ModelDocument = {
      ...document,
      relationships: [{ ...document.relationships[0], cardinality: 'ONE_TO_ONE' }],
    };

    expect(toEllieModel(oneToOne, { name: 'Sales', level: 'physical' }).model.relationships[0].targetEntity.endType).toBe('one');
  });

  test('rejects relationships to entities outside the document', () => {
    const dangling: ModelDocument = {
      ...document,
      relationships: [{ ...document.relationships[0], targetEntityId: 'e-missing' }],
    };

    expect(() => toEllieModel(dangling, { name: 'Sales', level: 'physical' })).toThrow(
      'Relationship references entity e-missing, which is not in the document'
    );
  });
});

describe('parseFolderId', () => {
  test('accepts digits only', () => {
    expect(parseFolderId(' 17 ')).toBe(17);
    expect(() => parseFolderId('abc')).toThrow('Folder ID must be a number, got "abc"');
    expect(() => parseFolderId('')).toThrow(TransferError);
  });
});

describe('fromEllieModel', () => {
  test('reads an exported model', () => {
    const result = fromEllieModel({
      id: 7,
      name: 'Sales',
      entities: [
        { id: 1, name: 'CUSTOMERS', attributes: [{ name: 'ID', metadata: { PK: true, 'DATA TYPE': 'NUMBER(38,0)' } }] },
        { id: 2, name: 'NOTES', attributes: [{ name: 'TEXT' }] },
      ],
      relationships: [
        {
          sourceEntity: { id: 1, attributeNames: ['ID'] },
          targetEntity: { id: 2, endType: 'one', attributeNames: ['CUSTOMER_ID'] },
        },
        {
          sourceEntity: { id: 1 },
          targetEntity: { id: 2 },
        },
      ],
    });

    expect(result).toEqual({
      entities: [
        {
          id: '1',
          name: 'CUSTOMERS',
          kind: 'TABLE',
          attributes: [
            { name: 'ID', type: 'INTEGER', nativeType: 'NUMBER(38,0)', isNullable: true, isPrimaryKey: true, isForeignKey: false },
          ],
        },
        {
          id: '2',
          name: 'NOTES',
          kind: 'TABLE',
          attributes: [
            { name: 'TEXT', type: 'OTHER', nativeType: '', isNullable: true, isPrimaryKey: false, isForeignKey: false },
          ],
        },
      ],
      relationships: [
        {
          sourceEntityId: '2',
          sourceAttribute: 'CUSTOMER_ID',
          targetEntityId: '1',
          targetAttribute: 'ID',
          origin: 'EXPLICIT',
          cardinality: 'ONE_TO_ONE',
        },
      ],
    });
  });

  test('splits composite relationships per attribute pair', () => {
    const result = fromEllieModel({
      model: {
        entities: [],
        relationships: [
          {
            sourceEntity: { id: 'items', attributeNames: ['ORDER_ID', 'LINE_NO'] },
            targetEntity: { id: 'shipments', endType: 'many', attributeNames: ['ORDER_ID', 'LINE_NO'] },
          },
        ],
      },
    });

    expect(result.relationships.map(r => `${r.sourceAttribute}->${r.targetAttribute} ${r.cardinality}`)).toEqual([
      'ORDER_ID->ORDER_ID ONE_TO_MANY',
      'LINE_NO->LINE_NO ONE_TO_MANY',
    ]);
  });

  test('rejects unexpected shapes', () => {
    expect(() => fromEllieModel('not a model')).toThrow(/^Unexpected model format from Ellie: /);
    expect(() => fromEllieModel(null)).toThrow(TransferError);
  });
});
