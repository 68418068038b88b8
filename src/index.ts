/**
 * record-factory - public API
 *
 * Declare tables, register factory definitions on a FactoryContext, and build
 * rows through RecordBuilder (TableRecords) or PojoBuilder (plain objects).
 */

// Schema
export { Field, FIELD_TYPES } from '@src/lib/field.js';
export type { FieldType, FieldTypeMap, FieldValue, FieldRow } from '@src/lib/field.js';
export { Table, FieldFactory, defineTable } from '@src/lib/table.js';
export type { Columns, FieldOptions, TableName } from '@src/lib/table.js';
export { TableRecord, camelCase } from '@src/lib/table-record.js';
export type { Projector } from '@src/lib/table-record.js';

// Factory core
export { FactoryContext } from '@src/lib/factory/context.js';
export type { FactoryContextOptions, DeclareDefinition } from '@src/lib/factory/context.js';
export { FactoryDefinition } from '@src/lib/factory/factory-definition.js';
export type { FactoryDefinitionInit } from '@src/lib/factory/factory-definition.js';
export { FactoryDefinitionBuilder, TraitBuilder } from '@src/lib/factory/definition-builder.js';
export { FactoryDefinitionRegistry, normalizeKey } from '@src/lib/factory/registry.js';
export { Trait } from '@src/lib/factory/trait.js';
export type { TraitInit } from '@src/lib/factory/trait.js';
export { RecordBuilder } from '@src/lib/factory/record-builder.js';
export type { BuildServices } from '@src/lib/factory/record-builder.js';
export { PojoBuilder } from '@src/lib/factory/pojo-builder.js';
export type { TimesCustomizer } from '@src/lib/factory/pojo-builder.js';
export { BuildConfiguration } from '@src/lib/factory/build-configuration.js';
export { TransientAttributes } from '@src/lib/factory/transient-attributes.js';
export type { TransientTypeTag, TransientTypeMap, Constructor } from '@src/lib/factory/transient-attributes.js';
export { runCallbacks } from '@src/lib/factory/callbacks.js';
export type { RecordCallback, TransientAwareCallback, CallbackPhase, LifecycleCallbacks } from '@src/lib/factory/callbacks.js';
export { GeneratorRegistry } from '@src/lib/factory/generator-registry.js';
export type { GeneratorRegistryOptions, TypeGenerators } from '@src/lib/factory/generator-registry.js';
export { constant, sequence } from '@src/lib/factory/value-generator.js';
export type { ValueGenerator, GenerationParams } from '@src/lib/factory/value-generator.js';

// Persistence
export {
    createAdapter,
    isSupportedDatabaseType,
    PostgresAdapter,
    SqliteAdapter,
    MEMORY_PATH,
    SqlRecordPersister,
    createTableSql,
    dropTableSql,
} from '@src/lib/database/index.js';
export type {
    DatabaseAdapter,
    DatabaseType,
    AdapterConfig,
    QueryResult,
    RecordPersister,
    RecordCounter,
    RecordStore,
} from '@src/lib/database/index.js';

// Ambient
export {
    FactoryError,
    DefinitionNotFoundError,
    ParentNotFoundError,
    CircularInheritanceError,
    TransientTypeError,
    FieldValueError,
    FactoryConfigError,
    FactoryDefinitionError,
    isFactoryError,
} from '@src/lib/errors.js';
export { Logger, logger } from '@src/lib/logger.js';
export type { LogLevel, LogMeta } from '@src/lib/logger.js';
export { FactoryEnv, DEFAULT_SETTINGS } from '@src/lib/factory-env.js';
export type { FactorySettings } from '@src/lib/factory-env.js';
export { loadEnv } from '@src/lib/env/load-env.js';
