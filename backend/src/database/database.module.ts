// NestJS decorators
import { Global, Module } from "@nestjs/common";

// DatabaseService wraps the shared PostgreSQL pool
import { DatabaseService } from "./database.service";

/**
 * DatabaseModule is declared as a global module.
 *
 * DatabaseService is the single entry point for PostgreSQL access and can be
 * injected anywhere without importing this module again.
 */
@Global()
@Module({
  providers: [DatabaseService],
  exports: [DatabaseService],
})
export class DatabaseModule {}
