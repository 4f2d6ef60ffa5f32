import { tokenize, tokenizeLongest, tokenizeSimple } from './tokenizer.js';

const expressionTerminals = ['+', '*', '(', ')', 'id'];

describe('tokenizeSimple()', () => {
  test('splits around operators', () => {
    expect(
      tokenizeSimple('id+id*id', expressionTerminals)._unsafeUnwrap()
    ).toEqual(['id', '+', 'id', '*', 'id']);
    expect(
      tokenizeSimple(' ( id )  * id', expressionTerminals)._unsafeUnwrap()
    ).toEqual(['(', 'id', ')', '*', 'id']);
  });

  test('keeps a chunk that is itself a terminal', () => {
    expect(tokenizeSimple('x -> x', ['->', 'x'])._unsafeUnwrap()).toEqual([
      'x',
      '->',
      'x',
    ]);
  });

  test('empty input has no tokens', () => {
    expect(tokenizeSimple('   ', ['a'])._unsafeUnwrap()).toEqual([]);
  });

  test('rejects unknown tokens', () => {
    const error = tokenizeSimple('a ab', ['a', 'b'])._unsafeUnwrapErr();
    expect(error.message).toEqual(
      "Unknown token 'ab' at position 1. Valid terminals: a, b"
    );
    expect(error.token).toEqual('ab');
    expect(error.position).toEqual(1);
  });
});

describe('tokenizeLongest()', () => {
  test('splits adjacent terminals', () => {
    expect(tokenizeLongest('ab a', ['a', 'b'])._unsafeUnwrap()).toEqual([
      'a',
      'b',
      'a',
    ]);
  });

  test('prefers the longest terminal', () => {
    expect(tokenizeLongest('idid i', ['i', 'id'])._unsafeUnwrap()).toEqual([
      'id',
      'id',
      'i',
    ]);
  });

  test('rejects characters no terminal starts with', () => {
    expect(tokenizeLongest('a?', ['a'])._unsafeUnwrapErr().message).toEqual(
      "Unknown token '?' at position 1. Valid terminals: a"
    );
  });
});

test('tokenize() picks the mode', () => {
  expect(tokenize('ab', ['a', 'b'], 'longest')._unsafeUnwrap()).toEqual([
    'a',
    'b',
  ]);
  expect(tokenize('ab', ['a', 'b']).isErr()).toBe(true);
});
