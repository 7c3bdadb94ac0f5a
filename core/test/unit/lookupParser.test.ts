import test from 'node:test';
import assert from 'node:assert/strict';

import {
  MalformedParameterError,
  UnknownFilterFieldError,
  UnknownLookupOperatorError,
} from '../../src/query/errors.js';
import { RequestParams } from '../../src/query/params.js';
import { parseLookupKey, parseLookups, parseOrdering } from '../../src/query/parser.js';
import { defineFilterSchema } from '../../src/schema/registry.js';
import { PEOPLE_FILTERS } from '../fixtures/people.js';

const schema = defineFilterSchema(PEOPLE_FILTERS);
const reserved = new Set(['order_by', 'search', 'page', 'per_page']);

test('parseLookupKey: bare field means equality', () => {
  assert.deepEqual(parseLookupKey('age', schema), { field: 'age', operator: 'eq' });
});

test('parseLookupKey: splits field and operator suffix', () => {
  assert.deepEqual(parseLookupKey('age__gte', schema), { field: 'age', operator: 'gte' });
  assert.deepEqual(parseLookupKey('status__not_in', schema), { field: 'status', operator: 'not_in' });
  assert.deepEqual(parseLookupKey('name__regexp', schema), { field: 'name', operator: 'regexp' });
});

test('parseLookupKey: unknown operator is reported before unknown field', () => {
  assert.throws(
    () => parseLookupKey('nickname__like', schema),
    (e: unknown) => {
      assert.ok(e instanceof UnknownLookupOperatorError);
      assert.equal(e.operator, 'like');
      assert.deepEqual(e.issues, [{ location: 'nickname__like', message: "Unknown lookup 'like'" }]);
      return true;
    },
  );
});

test('parseLookupKey: unknown field', () => {
  assert.throws(
    () => parseLookupKey('nickname__gt', schema),
    (e: unknown) => {
      assert.ok(e instanceof UnknownFilterFieldError);
      assert.equal(e.field, 'nickname');
      assert.deepEqual(e.issues, [{ location: 'nickname__gt', message: "Unknown filtering field 'nickname'" }]);
      return true;
    },
  );
});

test('parseLookupKey: more than one delimiter is treated as a bare field name', () => {
  assert.throws(
    () => parseLookupKey('age__gt__lt', schema),
    (e: unknown) => e instanceof UnknownFilterFieldError && e.field === 'age__gt__lt',
  );
});

test('parseLookups: skips reserved keys and keeps one lookup per occurrence', () => {
  const params = RequestParams.from(
    new URLSearchParams('age__gte=18&order_by=-age&age__gte=21&page=2&name=Ann&search=x&per_page=5'),
  );
  assert.deepEqual(parseLookups(params, schema, reserved), [
    { key: 'age__gte', field: 'age', operator: 'gte', raw: '18' },
    { key: 'age__gte', field: 'age', operator: 'gte', raw: '21' },
    { key: 'name', field: 'name', operator: 'eq', raw: 'Ann' },
  ]);
});

test('parseLookups: fails on the first offending key', () => {
  const params = RequestParams.from({ age__between: '1', nickname: 'x' });
  assert.throws(() => parseLookups(params, schema, reserved), UnknownLookupOperatorError);
});

test('RequestParams.from: flattens arrays and drops undefined values', () => {
  const params = RequestParams.from({ age: ['1', '2'], name: 'Ann', email: undefined });
  assert.deepEqual(params.entries(), [
    ['age', '1'],
    ['age', '2'],
    ['name', 'Ann'],
  ]);
  assert.equal(params.get('age'), '2');
  assert.equal(params.get('email'), undefined);
});

test('RequestParams.from: rejects nested values', () => {
  assert.throws(
    () => RequestParams.from({ name: { first: 'Ann' } }),
    (e: unknown) => {
      assert.ok(e instanceof MalformedParameterError);
      assert.deepEqual(e.issues, [{ location: 'name', message: "Parameter 'name' must be a string" }]);
      return true;
    },
  );
  assert.throws(() => RequestParams.from({ name: ['Ann', { first: 'Bo' }] }), MalformedParameterError);
});

test('parseOrdering: sign prefix selects direction', () => {
  assert.deepEqual(parseOrdering('name'), { field: 'name', dir: 'ASC' });
  assert.deepEqual(parseOrdering('+name'), { field: 'name', dir: 'ASC' });
  assert.deepEqual(parseOrdering('-name'), { field: 'name', dir: 'DESC' });
});
