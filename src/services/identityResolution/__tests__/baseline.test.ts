import { describe, expect, test } from 'vitest';
import { identity } from '../../../__tests__/helpers';
import { explainBird, scoreBird } from '../baseline';

describe('explainBird', () => {
  test('matches identical emails first', () => {
    const a = identity('Jane Doe', 'jane.doe@co.com');
    const b = identity('J. Doe', 'jane.doe@co.com');
    expect(explainBird(a, b)).toBe('email');
  });

  test('matches compacted local parts with a shared name token', () => {
    const a = identity('Jane Doe', 'jane.doe@co.com');
    const b = identity('Jane Q. Doe', 'jane_doe@home.org');
    expect(explainBird(a, b)).toBe('email-local');
  });

  test('needs a shared name token for a local-part match', () => {
    const a = identity('Bob Smith', 'bob@home.com');
    const b = identity('Bob Jones', 'bob@work.com');
    expect(explainBird(a, b)).toBe('email-local');

    const c = identity('Alice Wong', 'bob@work.com');
    expect(explainBird(a, c)).toBeNull();
  });

  test('matches equal name token sets regardless of order', () => {
    const a = identity('Doe Jane', 'x@a.com');
    const b = identity('Jane Doe', 'y@b.com');
    expect(explainBird(a, b)).toBe('name-set');
  });

  test('matches identical names across unrelated emails', () => {
    const a = identity('Bob Smith', 'bob@home.com');
    const b = identity('Bob Smith', 'bsmith@work.com');
    expect(explainBird(a, b)).toBe('name-set');
  });

  test('does not match on initials alone', () => {
    const a = identity('J. D.', 'a@x.com');
    const b = identity('J D', 'b@y.com');
    expect(explainBird(a, b)).toBeNull();
  });

  test('does not match name sets of short tokens only', () => {
    const a = identity('Al Li', 'al@x.com');
    const b = identity('Al Li', 'li@y.com');
    expect(explainBird(a, b)).toBeNull();
  });

  test('never matches empty identities', () => {
    const empty = identity('', '');
    expect(explainBird(empty, identity('', ''))).toBeNull();
    expect(explainBird(empty, identity('Jane Doe', 'jane@co.com'))).toBeNull();
  });
});

describe('scoreBird', () => {
  const fixtures = [
    identity('Jane Doe', 'jane.doe@co.com'),
    identity('J. Doe', 'jane.doe@co.com'),
    identity('Jane Doe', 'jdoe@home.org'),
    identity('Bob Smith', 'bob@home.com'),
    identity('Robert Smith', 'rsmith@work.io'),
    identity('', ''),
  ];

  test('is symmetric', () => {
    for (const a of fixtures) {
      for (const b of fixtures) {
        expect(scoreBird(a, b)).toBe(scoreBird(b, a));
      }
    }
  });

  test('matches any non-degenerate identity with itself', () => {
    for (const a of fixtures.slice(0, 5)) {
      expect(scoreBird(a, a)).toBe(true);
    }
  });
});
