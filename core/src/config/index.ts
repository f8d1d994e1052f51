export { DEFAULT_CONFIG_DIR, createConfigValidator, parseConfigText, readConfigFile } from './config-file.js';
export type { ConfigValidator } from './config-file.js';
export {
  DEFAULT_SCHEMA_CONFIG_PATH,
  DEFAULT_SCHEMA_NAME,
  loadSchemaConfig,
  parseSchemaConfig,
} from './schema-config.js';
export type {
  BoundarySchema,
  HeaderSchema,
  LayoutObjectSchema,
  LayoutSchema,
  PartTypeSchema,
  PlacementSchema,
  ResourceSchema,
  SchemaConfig,
} from './schema-config.js';
export {
  DEFAULT_BACKEND_SETTINGS,
  DEFAULT_ERROR_HANDLING,
  DEFAULT_MAPPING_RULES_PATH,
  DEFAULT_MATERIAL_UNIT_RULES,
  DEFAULT_NAMING_RULES,
  loadMappingRules,
  parseMappingRules,
} from './mapping-rules.js';
export type {
  BackendSettings,
  CaseHandling,
  DataType,
  ErrorHandlingRules,
  ErrorPolicy,
  ErrorPolicyCategory,
  MappingRules,
  MaterialUnitRules,
  NamingRules,
  PropertyRule,
  ResourceRule,
  ScalarValue,
  UnitCategory,
} from './mapping-rules.js';
