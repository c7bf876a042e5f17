import type { UserIdentity } from '../../app/domain/entities';

export const ALICE: UserIdentity = {
  username: 'alice@example.org',
  name: 'Alice',
  email: 'alice@example.org',
  groups: ['users']
};

export const BOB: UserIdentity = {
  username: 'bob@example.org',
  name: 'Bob',
  email: 'bob@example.org',
  groups: ['users']
};

export const STAFF: UserIdentity = {
  username: 'sam@example.org',
  name: 'Sam',
  email: 'sam@example.org',
  groups: ['staff']
};

export const ADMIN: UserIdentity = {
  username: 'root@example.org',
  name: 'Root',
  email: 'root@example.org',
  groups: ['admins']
};
