import { describe, it, expect } from 'vitest';
import { isAdminUser, memberRoleIds } from '../../../src/services/admin/adminAuth';

describe('isAdminUser', () => {
  const config = { ADMIN_IDS: ['111', '222'], ADMIN_ROLE_ID: 'role-admin' };

  it('accepts whitelisted users', () => {
    expect(isAdminUser('222', [], config)).toBe(true);
  });

  it('accepts holders of the admin role', () => {
    expect(isAdminUser('999', ['role-member', 'role-admin'], config)).toBe(true);
  });

  it('rejects everyone else', () => {
    expect(isAdminUser('999', ['role-member'], config)).toBe(false);
  });

  it('ignores roles when no admin role is configured', () => {
    expect(isAdminUser('999', [''], { ADMIN_IDS: [], ADMIN_ROLE_ID: '' })).toBe(false);
  });
});

describe('memberRoleIds', () => {
  it('returns nothing outside a guild', () => {
    expect(memberRoleIds(null)).toEqual([]);
  });
});
