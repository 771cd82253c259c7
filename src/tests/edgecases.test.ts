/**
 * Edge-case tests: unusual but legal input, and inputs near the limits.
 */

import { test, describe } from 'node:test';
import assert from 'node:assert/strict';

import { DEFAULT_MAX_LINE_LENGTH, VCard, parseCard, textDateTime } from '../index.js';
import { card, crlf, expectError, expectOk } from './helpers.js';

describe('Folding', () => {
  test('tab continuation', () => {
    const vc = expectOk(parseCard(card(['FN:Jane', 'NOTE:ab', '\tcd'])));
    assert.equal(vc.getProperties('NOTE')[0]?.value, 'abcd');
  });

  test('only one leading whitespace character is removed', () => {
    const vc = expectOk(parseCard(card(['FN:Jane', 'NOTE:one', '  two'])));
    assert.equal(vc.getProperties('NOTE')[0]?.value, 'one two');
  });

  test('several continuation lines', () => {
    const vc = expectOk(parseCard(card(['FN:J', ' a', ' ne'])));
    assert.equal(vc.displayName, 'Jane');
  });

  test('folded BEGIN line', () => {
    const vc = expectOk(parseCard(crlf(['BEGIN:VC', ' ARD', 'VERSION:4.0', 'FN:Jane', 'END:VCARD'])));
    assert.equal(vc.displayName, 'Jane');
  });
});

describe('Names and parameters', () => {
  test('lowercase names are kept on output', () => {
    const text = card(['fn:Jane', 'email:jane@example.com']);
    const vc = expectOk(parseCard(text));
    assert.equal(vc.fn.name, 'fn');
    assert.equal(vc.toString(), text);
  });

  test('quoted colon in a parameter value', () => {
    const text = card(['FN:Jane', 'NOTE;X-LABEL="a:b":hello']);
    const vc = expectOk(parseCard(text));
    const note = vc.optionalProperties[0];
    assert.ok(note);
    assert.deepEqual(note.parameters, [{ name: 'X-LABEL', value: '"a:b"' }]);
    assert.equal(note.value, 'hello');
    assert.equal(vc.toString(), text);
  });

  test('quoted semicolon in a parameter value', () => {
    const vc = expectOk(parseCard(card(['FN:Jane', 'NOTE;X-LABEL="a;b":hello'])));
    assert.deepEqual(vc.optionalProperties[0]?.parameters, [{ name: 'X-LABEL', value: '"a;b"' }]);
  });

  test('whitespace around parameter keys and values is trimmed', () => {
    const vc = expectOk(parseCard(card(['FN:Jane', 'TEL; TYPE = cell :tel:+1-555-0100'])));
    assert.deepEqual(vc.optionalProperties[0]?.parameters, [{ name: 'TYPE', value: 'cell' }]);
  });

  test('empty parameter segment is rejected', () => {
    expectError(parseCard(card(['FN:Jane', 'TEL;;TYPE=cell:tel:+1-555-0100'])), 'InvalidProperty');
  });

  test('value keeps later colons', () => {
    const vc = expectOk(parseCard(card(['FN:Jane', 'URL:https://example.com:8080/x'])));
    assert.equal(vc.optionalProperties[0]?.value, 'https://example.com:8080/x');
  });

  test('a dot after the first ";" is not a group separator', () => {
    const vc = expectOk(parseCard(card(['FN:Jane', 'NOTE;X-A=b.c:hi'])));
    const note = vc.optionalProperties[0];
    assert.ok(note);
    assert.equal(note.group, '');
    assert.equal(note.name, 'NOTE');
  });
});

describe('Special properties', () => {
  test('grouped BDAY is routed to the birthday and loses its group', () => {
    const vc = expectOk(parseCard(card(['FN:Jane', 'item1.BDAY:19900615'])));
    assert.equal(vc.optionalProperties.length, 0);
    assert.deepEqual(vc.birthday, { isText: false, date: '19900615', time: '', utc: false });
    assert.equal(vc.toString(), card(['FN:Jane', 'BDAY:19900615']));
  });

  test('VALUE=text matching is case-insensitive', () => {
    const vc = expectOk(parseCard(card(['FN:Jane', 'bday;value=TEXT:someday'])));
    assert.deepEqual(vc.birthday, textDateTime('someday'));
  });

  test('VERSION with parameters', () => {
    expectOk(parseCard(crlf(['BEGIN:VCARD', 'VERSION;X=1:4.0', 'FN:Jane', 'END:VCARD'])));
  });

  test('VERSION after FN', () => {
    expectOk(parseCard(crlf(['BEGIN:VCARD', 'FN:Jane', 'VERSION:4.0', 'END:VCARD'])));
  });

  test('compound value with fewer fields parses but does not validate', () => {
    const vc = expectOk(parseCard(card(['FN:Jane', 'N:Roe;Jane'])));
    assert.deepEqual(vc.optionalProperties[0]?.values, ['Roe', 'Jane']);
    expectError(vc.validate(), 'InvalidProperty');
  });

  test('compound fields are trimmed', () => {
    const vc = expectOk(parseCard(card(['FN:Jane', 'N: Roe ; Jane ;;;'])));
    assert.deepEqual(vc.optionalProperties[0]?.values, ['Roe', 'Jane', '', '', '']);
  });

  test('date and time concatenate on output', () => {
    const vc = expectOk(parseCard(card(['FN:Jane', 'BDAY:19900615T143000'])));
    assert.equal(vc.toString(), card(['FN:Jane', 'BDAY:19900615143000']));
  });
});

describe('Line length', () => {
  test('a line at the limit is accepted', () => {
    const fn = 'FN:' + 'x'.repeat(DEFAULT_MAX_LINE_LENGTH - 3);
    const vc = expectOk(parseCard(card([fn])));
    assert.equal(vc.displayName.length, DEFAULT_MAX_LINE_LENGTH - 3);
  });

  test('a line over the limit is malformed', () => {
    const fn = 'FN:' + 'x'.repeat(DEFAULT_MAX_LINE_LENGTH - 2);
    const err = expectError(parseCard(card([fn])), 'InvalidCardStructure');
    assert.equal(err.line, 3);
  });
});

describe('Card shape', () => {
  test('a card built in code with only FN', () => {
    const vc = VCard.create('Jane');
    expectOk(vc.validate());
    assert.equal(vc.toString(), card(['FN:Jane']));
  });

  test('empty FN value is a parse error', () => {
    expectError(parseCard(card(['FN:'])), 'InvalidProperty');
  });
});
