/**
 * @fileoverview Infrastructure Layer Package
 *
 * Adapters that implement the replenishment ports declared in
 * `@clinistock/domain`: PostgreSQL repositories for production and an
 * in-memory repository for development and tests.
 *
 * @module @clinistock/infrastructure
 *
 * @example
 * ```typescript
 * import { createDatabaseClient } from '@clinistock/core';
 * import { createReplenishmentService } from '@clinistock/domain';
 * import { createPostgresReplenishmentRepositories } from '@clinistock/infrastructure';
 *
 * const repositories = createPostgresReplenishmentRepositories(createDatabaseClient());
 * const service = createReplenishmentService(repositories);
 * ```
 */

export * from './repositories/index.js';
