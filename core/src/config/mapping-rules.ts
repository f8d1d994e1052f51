import { resolve } from 'node:path';
import {
  DEFAULT_CONFIG_DIR,
  createConfigValidator,
  parseConfigText,
  readConfigFile,
} from './config-file.js';

export type DataType = 'string' | 'int' | 'float' | 'positive_int' | 'positive_float';

export type ScalarValue = string | number | boolean;

export interface PropertyRule {
  /** Source property name as written in the rule table. */
  readonly source: string;
  /** Target attribute path on the created object. Absent for handler-only rules. */
  readonly target?: string;
  readonly dataType?: DataType;
  /** Unit category used to convert the value to its base unit. */
  readonly unitConversion?: string;
  readonly specialHandler?: string;
}

export interface ResourceRule {
  /** Lower-cased resource type the rule is keyed by. */
  readonly resourceType: string;
  readonly template: string;
  /** A second resource type served by this rule, lower-cased. */
  readonly alias?: string;
  readonly properties: readonly PropertyRule[];
  readonly requiredProperties: readonly string[];
  readonly defaultProperties: Readonly<Record<string, ScalarValue>>;
}

export interface UnitCategory {
  readonly baseUnit: string;
  readonly conversions: Readonly<Record<string, number>>;
}

export type CaseHandling = 'upper' | 'lower' | 'preserve';

export interface NamingRules {
  readonly caseHandling: CaseHandling;
  readonly invalidChars: readonly string[];
  readonly replacementChar: string;
  readonly maxLength: number;
  readonly digitPrefix: string;
}

export interface BackendSettings {
  readonly modelFrame: string;
  readonly connector: string;
  readonly userObjects: string;
  /** Template name to full template path. */
  readonly templates: Readonly<Record<string, string>>;
}

export type ErrorPolicy = 'error_and_stop' | 'warn_and_continue' | 'ignore';

export type ErrorPolicyCategory = 'creation' | 'property' | 'connection';

export type ErrorHandlingRules = Readonly<Record<ErrorPolicyCategory, ErrorPolicy>>;

export interface MaterialUnitRules {
  readonly templatePath: string;
  readonly namePrefix: string;
  readonly targetProperty: string;
}

export interface MappingRules {
  readonly resourceMappings: ReadonlyMap<string, ResourceRule>;
  readonly unitConversions: Readonly<Record<string, UnitCategory>>;
  readonly propertyValidation: {
    /** Inclusive [min, max], keyed by lower-cased source property name. */
    readonly ranges: Readonly<Record<string, readonly [number, number]>>;
  };
  readonly naming: NamingRules;
  readonly backend: BackendSettings;
  readonly errorHandling: ErrorHandlingRules;
  readonly materialUnits: MaterialUnitRules;
}

export const DEFAULT_MAPPING_RULES_PATH = resolve(DEFAULT_CONFIG_DIR, 'object-mapping.yaml');

export const DEFAULT_NAMING_RULES: NamingRules = {
  caseHandling: 'preserve',
  invalidChars: [' ', '-', '.', '/', '\\', ':', '(', ')', ',', '#'],
  replacementChar: '_',
  maxLength: 32,
  digitPrefix: 'obj_',
};

export const DEFAULT_BACKEND_SETTINGS: BackendSettings = {
  modelFrame: '.Models.Model',
  connector: '.MaterialFlow.Connector',
  userObjects: '.UserObjects',
  templates: {},
};

export const DEFAULT_ERROR_HANDLING: ErrorHandlingRules = {
  creation: 'warn_and_continue',
  property: 'warn_and_continue',
  connection: 'warn_and_continue',
};

export const DEFAULT_MATERIAL_UNIT_RULES: MaterialUnitRules = {
  templatePath: '.MUs.Entity',
  namePrefix: 'Part',
  targetProperty: 'MU',
};

interface RawPropertyRule {
  target?: string;
  data_type?: DataType;
  unit_conversion?: string;
  special_handler?: string;
}

interface RawResourceRule {
  template: string;
  alias?: string;
  properties?: Record<string, RawPropertyRule>;
  required_properties?: string[];
  default_properties?: Record<string, ScalarValue>;
}

interface RawMappingRules {
  resource_mappings: Record<string, RawResourceRule>;
  unit_conversions?: Record<string, { base_unit: string; conversions: Record<string, number> }>;
  property_validation?: { ranges?: Record<string, number[]> };
  naming?: {
    case_handling?: CaseHandling;
    invalid_chars?: string[];
    replacement_char?: string;
    max_length?: number;
    digit_prefix?: string;
  };
  backend?: {
    model_frame?: string;
    connector?: string;
    user_objects?: string;
    templates?: Record<string, string>;
  };
  error_handling?: Partial<Record<ErrorPolicyCategory, ErrorPolicy>>;
  material_units?: {
    template_path?: string;
    name_prefix?: string;
    target_property?: string;
  };
}

const mappingRulesValidator = createConfigValidator<RawMappingRules>('mapping-rules.schema.json');

export async function loadMappingRules(filePath: string = DEFAULT_MAPPING_RULES_PATH): Promise<MappingRules> {
  const text = await readConfigFile(filePath);
  return parseMappingRules(text, filePath);
}

/**
 * Parses a mapping rule table. Sections left out of the file fall back to
 * the defaults exported above.
 */
export function parseMappingRules(text: string, source = '<inline>'): MappingRules {
  const raw = parseConfigText(text, mappingRulesValidator, source);

  const resourceMappings = new Map<string, ResourceRule>();
  for (const [type, rule] of Object.entries(raw.resource_mappings)) {
    const resourceType = type.toLowerCase();
    resourceMappings.set(resourceType, normalizeResourceRule(resourceType, rule));
  }

  const unitConversions: Record<string, UnitCategory> = {};
  for (const [category, table] of Object.entries(raw.unit_conversions ?? {})) {
    unitConversions[category] = { baseUnit: table.base_unit, conversions: { ...table.conversions } };
  }

  const ranges: Record<string, readonly [number, number]> = {};
  for (const [name, bounds] of Object.entries(raw.property_validation?.ranges ?? {})) {
    const [min, max] = bounds;
    if (min !== undefined && max !== undefined) {
      ranges[name.toLowerCase()] = [min, max];
    }
  }

  const naming = raw.naming ?? {};
  const backend = raw.backend ?? {};
  const materialUnits = raw.material_units ?? {};

  return {
    resourceMappings,
    unitConversions,
    propertyValidation: { ranges },
    naming: {
      caseHandling: naming.case_handling ?? DEFAULT_NAMING_RULES.caseHandling,
      invalidChars: naming.invalid_chars ?? DEFAULT_NAMING_RULES.invalidChars,
      replacementChar: naming.replacement_char ?? DEFAULT_NAMING_RULES.replacementChar,
      maxLength: naming.max_length ?? DEFAULT_NAMING_RULES.maxLength,
      digitPrefix: naming.digit_prefix ?? DEFAULT_NAMING_RULES.digitPrefix,
    },
    backend: {
      modelFrame: backend.model_frame ?? DEFAULT_BACKEND_SETTINGS.modelFrame,
      connector: backend.connector ?? DEFAULT_BACKEND_SETTINGS.connector,
      userObjects: backend.user_objects ?? DEFAULT_BACKEND_SETTINGS.userObjects,
      templates: { ...backend.templates },
    },
    errorHandling: { ...DEFAULT_ERROR_HANDLING, ...raw.error_handling },
    materialUnits: {
      templatePath: materialUnits.template_path ?? DEFAULT_MATERIAL_UNIT_RULES.templatePath,
      namePrefix: materialUnits.name_prefix ?? DEFAULT_MATERIAL_UNIT_RULES.namePrefix,
      targetProperty: materialUnits.target_property ?? DEFAULT_MATERIAL_UNIT_RULES.targetProperty,
    },
  };
}

function normalizeResourceRule(resourceType: string, raw: RawResourceRule): ResourceRule {
  const properties = Object.entries(raw.properties ?? {}).map(
    ([source, rule]): PropertyRule => ({
      source,
      target: rule.target,
      dataType: rule.data_type,
      unitConversion: rule.unit_conversion,
      specialHandler: rule.special_handler,
    }),
  );
  return {
    resourceType,
    template: raw.template,
    alias: raw.alias?.toLowerCase(),
    properties,
    requiredProperties: raw.required_properties ?? [],
    defaultProperties: { ...raw.default_properties },
  };
}
