import { test, describe } from 'node:test';
import assert from 'node:assert/strict';

import {
  Property,
  PROPERTY_NAMES,
  buildProperty,
  isKnownPropertyName,
  isCompoundProperty,
} from '../index.js';
import { expectError, expectOk } from './helpers.js';

describe('buildProperty', () => {
  test('splits group, name and parameters', () => {
    const prop = expectOk(buildProperty('item1.TEL;TYPE=cell;PREF=1', 'tel:+1-555-0100'));
    assert.equal(prop.group, 'item1');
    assert.equal(prop.name, 'TEL');
    assert.deepEqual(prop.parameters, [
      { name: 'TYPE', value: 'cell' },
      { name: 'PREF', value: '1' },
    ]);
    assert.deepEqual(prop.values, ['tel:+1-555-0100']);
  });

  test('group defaults to empty string', () => {
    const prop = expectOk(buildProperty('EMAIL', 'alice@example.com'));
    assert.equal(prop.group, '');
    assert.deepEqual(prop.parameters, []);
  });

  test('keeps the name as written', () => {
    const prop = expectOk(buildProperty('email', 'alice@example.com'));
    assert.equal(prop.name, 'email');
    assert.equal(prop.baseName, 'EMAIL');
  });

  test('trims whitespace around parameter keys and values', () => {
    const prop = expectOk(buildProperty('EMAIL; TYPE = work', 'a@example.com'));
    assert.deepEqual(prop.parameters, [{ name: 'TYPE', value: 'work' }]);
  });

  test('keeps quoted parameter values intact', () => {
    const prop = expectOk(buildProperty('TEL;TYPE="work;voice"', 'tel:+1-555-0100'));
    assert.deepEqual(prop.parameters, [{ name: 'TYPE', value: '"work;voice"' }]);
  });

  test('parameter without "=" is rejected', () => {
    const err = expectError(buildProperty('TEL;cell', 'tel:+1-555-0100'), 'InvalidProperty');
    assert.equal(err.property, 'TEL');
  });

  test('empty parameter key or value is rejected', () => {
    expectError(buildProperty('TEL;=cell', 'x'), 'InvalidProperty');
    expectError(buildProperty('TEL;TYPE=', 'x'), 'InvalidProperty');
    expectError(buildProperty('TEL;TYPE=  ', 'x'), 'InvalidProperty');
    expectError(buildProperty('TEL;;TYPE=cell', 'x'), 'InvalidProperty');
  });

  test('empty name is rejected', () => {
    expectError(buildProperty('item1.', 'x'), 'InvalidProperty');
    expectError(buildProperty(';TYPE=x', 'x'), 'InvalidProperty');
  });

  test('N is split into trimmed fields, empty ones kept', () => {
    const prop = expectOk(buildProperty('N', 'Doe; John ;;;'));
    assert.deepEqual(prop.values, ['Doe', 'John', '', '', '']);
  });

  test('ADR is compound regardless of case', () => {
    const prop = expectOk(buildProperty('adr', ';;123 Main St;Springfield;IL;62701;USA'));
    assert.deepEqual(prop.values, ['', '', '123 Main St', 'Springfield', 'IL', '62701', 'USA']);
  });

  test('other properties keep the whole value', () => {
    const prop = expectOk(buildProperty('ORG', 'Example Corp;Engineering'));
    assert.deepEqual(prop.values, ['Example Corp;Engineering']);
  });

  test('unknown names are accepted by the builder', () => {
    const prop = expectOk(buildProperty('X-FOO', 'bar'));
    assert.equal(prop.name, 'X-FOO');
  });
});

describe('Property', () => {
  test('getParameter is case-insensitive and returns the first match', () => {
    const prop = new Property('TEL', ['x'], [
      { name: 'type', value: 'cell' },
      { name: 'TYPE', value: 'home' },
    ]);
    assert.equal(prop.getParameter('Type'), 'cell');
    assert.equal(prop.getParameter('PREF'), undefined);
  });

  test('isTextValue detects VALUE=text in any case', () => {
    assert.equal(expectOk(buildProperty('BDAY;value=TEXT', 'circa 1990')).isTextValue, true);
    assert.equal(expectOk(buildProperty('BDAY;VALUE="text"', 'circa 1990')).isTextValue, true);
    assert.equal(expectOk(buildProperty('BDAY;VALUE=date', '19900615')).isTextValue, false);
    assert.equal(expectOk(buildProperty('BDAY', '19900615')).isTextValue, false);
  });

  test('value and valueType accessors', () => {
    const prop = new Property('PHOTO', ['http://example.com/a.png'], [{ name: 'VALUE', value: 'uri' }]);
    assert.equal(prop.value, 'http://example.com/a.png');
    assert.equal(prop.valueType, 'uri');
    assert.equal(new Property('NOTE').value, '');
  });

  test('clone shares nothing with the original', () => {
    const prop = new Property('TEL', ['a'], [{ name: 'TYPE', value: 'cell' }], 'g');
    const copy = prop.clone();
    copy.values.push('b');
    const param = copy.parameters[0];
    assert.ok(param);
    param.value = 'home';
    assert.deepEqual(prop.values, ['a']);
    assert.deepEqual(prop.parameters, [{ name: 'TYPE', value: 'cell' }]);
    assert.equal(copy.group, 'g');
  });
});

describe('Property names', () => {
  test('whitelist has 28 names', () => {
    assert.equal(PROPERTY_NAMES.length, 28);
  });

  test('isKnownPropertyName is case-insensitive', () => {
    assert.equal(isKnownPropertyName('tel'), true);
    assert.equal(isKnownPropertyName('CLIENTPIDMAP'), true);
    assert.equal(isKnownPropertyName('VERSION'), false);
    assert.equal(isKnownPropertyName('KEY'), false);
    assert.equal(isKnownPropertyName('X-FOO'), false);
  });

  test('isCompoundProperty', () => {
    assert.equal(isCompoundProperty('N'), true);
    assert.equal(isCompoundProperty('adr'), true);
    assert.equal(isCompoundProperty('ORG'), false);
  });
});
