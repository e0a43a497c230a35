// Not a migration: discovery ignores names without the version_ prefix.

export const FIXTURE_TABLES = [ 'posts', 'users' ];
