// Tests for owner resolution

import { describe, it, expect } from 'vitest';
import { userInfo } from 'node:os';
import { currentUser } from './owner.js';

describe('currentUser', () => {
  it('should prefer LOGNAME over USER', () => {
    expect(currentUser({ LOGNAME: 'operator', USER: 'someone-else' })).toBe('operator');
  });

  it('should fall back through USER, LNAME and USERNAME', () => {
    expect(currentUser({ USER: 'alice' })).toBe('alice');
    expect(currentUser({ LNAME: 'bob' })).toBe('bob');
    expect(currentUser({ USERNAME: 'carol' })).toBe('carol');
  });

  it('should skip empty variables', () => {
    expect(currentUser({ LOGNAME: '', USER: 'alice' })).toBe('alice');
  });

  it('should ask the operating system when no variable is set', () => {
    expect(currentUser({})).toBe(userInfo().username);
  });
});
