/**
 * Mapping Engine
 *
 * Turns the resources of a layout document into object mappings: which
 * template to instantiate, under which name, and which attribute values to
 * set. Per-object problems are recorded on the mapping; the engine never
 * throws for them.
 */

import type { MappingRules, PropertyRule, ResourceRule } from '../config/mapping-rules.js';
import {
  MappingErrorCode,
  WarningCode,
  createDiagnostic,
  type DiagnosticSubject,
} from '../errors/index.js';
import type { LayoutDocument, LayoutObject, Placement, Property, Resource } from '../ir/index.js';
import { noopLogger, type Logger } from '../logger.js';
import { sanitizeName } from './name-sanitizer.js';
import {
  ASSIGN_MATERIAL_UNIT,
  createMaterialUnitRegistry,
  type MaterialUnitRegistry,
} from './special-handlers.js';
import type { MappingOutcome, ObjectMapping } from './types.js';
import { createUnitConverter, type UnitConverter } from './unit-converter.js';
import { checkValue, coerceValue } from './value-coercion.js';

export interface MappingOptions {
  logger?: Partial<Logger>;
}

export function mapLayoutDocument(
  document: LayoutDocument,
  rules: MappingRules,
  options: MappingOptions = {},
): MappingOutcome {
  const run = new MappingRun(document, rules, options.logger ?? noopLogger);
  return run.map();
}

/**
 * Finds the rule for a resource type: direct key first, then a rule that
 * names the type as its alias.
 */
export function findResourceRule(rules: MappingRules, resourceType: string): ResourceRule | undefined {
  const type = resourceType.toLowerCase();
  const direct = rules.resourceMappings.get(type);
  if (direct) {
    return direct;
  }
  for (const rule of rules.resourceMappings.values()) {
    if (rule.alias === type) {
      return rule;
    }
  }
  return undefined;
}

class MappingRun {
  private readonly units: UnitConverter;
  private readonly materialUnits: MaterialUnitRegistry;

  constructor(
    private readonly document: LayoutDocument,
    private readonly rules: MappingRules,
    private readonly logger: Partial<Logger>,
  ) {
    this.units = createUnitConverter(rules.unitConversions);
    this.materialUnits = createMaterialUnitRegistry(rules.materialUnits);
  }

  map(): MappingOutcome {
    const mappings = new Map<string, ObjectMapping>();
    const unmapped: string[] = [];

    for (const layoutObject of this.document.layoutObjects.values()) {
      const resource = this.document.getResource(layoutObject.associatedResourceId);
      if (!resource) {
        this.logger.debug?.('mapping.resource.missing', {
          layoutObjectId: layoutObject.identifier,
          resourceId: layoutObject.associatedResourceId,
        });
        continue;
      }
      if (mappings.has(resource.identifier)) {
        this.logger.debug?.('mapping.resource.duplicate', {
          layoutObjectId: layoutObject.identifier,
          resourceId: resource.identifier,
        });
        continue;
      }

      const rule = findResourceRule(this.rules, resource.resourceType);
      if (!rule) {
        this.logger.info?.('mapping.type.unmapped', {
          resourceId: resource.identifier,
          resourceType: resource.resourceType,
        });
        unmapped.push(resource.identifier);
        continue;
      }

      const mapping = this.mapResource(resource, layoutObject, rule);
      mappings.set(resource.identifier, mapping);
      this.logger.debug?.('mapping.object.mapped', {
        resourceId: resource.identifier,
        template: mapping.template,
        properties: mapping.properties.length,
        errors: mapping.errors.length,
        warnings: mapping.warnings.length,
      });
    }

    return { mappings, materialUnits: this.materialUnits.list(), unmapped };
  }

  private mapResource(resource: Resource, layoutObject: LayoutObject, rule: ResourceRule): ObjectMapping {
    const name = sanitizeName(resource.name || resource.identifier, this.rules.naming);
    const mapping: ObjectMapping = {
      resourceId: resource.identifier,
      resourceType: resource.resourceType,
      layoutObjectId: layoutObject.identifier,
      template: rule.template,
      name,
      properties: [],
      errors: [],
      warnings: [],
    };

    this.mapPlacement(mapping, this.document.getPlacement(layoutObject.identifier));
    mapping.properties.push({ kind: 'name', target: 'name', value: name });

    for (const propertyRule of rule.properties) {
      const property = resource.getProperty(propertyRule.source);
      if (property) {
        this.mapProperty(mapping, property, propertyRule);
      }
    }
    this.applyRequiredProperties(mapping, resource, rule);
    return mapping;
  }

  private mapPlacement(mapping: ObjectMapping, placement: Placement | undefined): void {
    if (!placement) {
      mapping.warnings.push(
        createDiagnostic(WarningCode.MISSING_PLACEMENT, 'No placement information found', {
          entityKind: 'object',
          identifier: mapping.resourceId,
          referenceId: mapping.layoutObjectId,
        }),
      );
      return;
    }
    const { position, rotation } = placement;
    mapping.properties.push({ kind: 'vector', target: 'Coordinate3D', values: [position.x, position.y, position.z] });
    if (rotation) {
      mapping.properties.push({
        kind: 'vector',
        target: '_3D.Rotation',
        values: [rotation.angle, rotation.axisX, rotation.axisY, rotation.axisZ],
      });
    }
  }

  private mapProperty(mapping: ObjectMapping, property: Property, rule: PropertyRule): void {
    const subject: DiagnosticSubject = {
      entityKind: 'property',
      identifier: mapping.resourceId,
      property: rule.source,
    };

    if (rule.specialHandler) {
      this.applySpecialHandler(mapping, property, rule, subject);
      return;
    }

    const converted = rule.unitConversion ? this.convertUnit(mapping, property, rule.unitConversion, subject) : property.value;
    const value = coerceValue(converted, rule.dataType);
    const problem = checkValue(rule.source, value, rule.dataType, this.rules.propertyValidation.ranges, subject);
    if (problem) {
      mapping.errors.push(problem);
      return;
    }
    mapping.properties.push({
      kind: 'value',
      target: rule.target ?? rule.source,
      value,
      dataType: rule.dataType ?? 'string',
    });
  }

  /**
   * Converts to the category's base unit. A property without a unit takes
   * the document's default unit for time, length and weight.
   */
  private convertUnit(
    mapping: ObjectMapping,
    property: Property,
    category: string,
    subject: DiagnosticSubject,
  ): string | number {
    const numeric = property.numericValue();
    if (numeric === undefined) {
      mapping.warnings.push(
        createDiagnostic(
          WarningCode.NON_NUMERIC_VALUE,
          `Cannot convert non-numeric value '${property.value}' of ${property.name}`,
          subject,
        ),
      );
      return property.value;
    }

    const unit = property.unit ?? this.documentUnit(category);
    const lookup = this.units.inspect(unit, category);
    switch (lookup.kind) {
      case 'factor':
        return numeric * lookup.factor;
      case 'base':
        return numeric;
      case 'unknown-category':
        mapping.warnings.push(
          createDiagnostic(WarningCode.UNKNOWN_CONVERSION_CATEGORY, `Unknown unit category '${category}'`, subject),
        );
        return numeric;
      case 'unknown-unit':
        mapping.warnings.push(
          createDiagnostic(
            WarningCode.UNKNOWN_UNIT,
            `Unknown ${category} unit '${unit ?? ''}' for ${property.name}; value kept as is`,
            subject,
          ),
        );
        return numeric;
      case 'missing-unit':
        mapping.warnings.push(
          createDiagnostic(
            WarningCode.MISSING_UNIT,
            `No unit given for ${property.name}; assuming ${this.units.baseUnit(category) ?? category}`,
            subject,
          ),
        );
        return numeric;
    }
  }

  private documentUnit(category: string): string | undefined {
    const { units } = this.document.header;
    switch (category) {
      case 'time':
        return units.time;
      case 'length':
        return units.length;
      case 'weight':
        return units.weight;
      default:
        return undefined;
    }
  }

  private applySpecialHandler(
    mapping: ObjectMapping,
    property: Property,
    rule: PropertyRule,
    subject: DiagnosticSubject,
  ): void {
    if (rule.specialHandler !== ASSIGN_MATERIAL_UNIT) {
      mapping.warnings.push(
        createDiagnostic(WarningCode.UNKNOWN_SPECIAL_HANDLER, `Unknown special handler: ${rule.specialHandler ?? ''}`, subject),
      );
      return;
    }
    const assignment = this.materialUnits.assign(property.value);
    mapping.properties.push({
      kind: 'material-unit',
      target: rule.target ?? this.rules.materialUnits.targetProperty,
      label: assignment.label,
      objectName: assignment.objectName,
      sourceValue: assignment.sourceValue,
    });
  }

  private applyRequiredProperties(mapping: ObjectMapping, resource: Resource, rule: ResourceRule): void {
    for (const required of rule.requiredProperties) {
      if (resource.getProperty(required)) {
        continue;
      }
      const subject: DiagnosticSubject = { entityKind: 'property', identifier: mapping.resourceId, property: required };
      const fallback = rule.defaultProperties[required] ?? rule.defaultProperties[required.toLowerCase()];
      if (fallback === undefined) {
        mapping.errors.push(
          createDiagnostic(
            MappingErrorCode.MISSING_REQUIRED_PROPERTY,
            `Required property '${required}' not found and no default available`,
            subject,
          ),
        );
        continue;
      }

      const propertyRule = rule.properties.find((candidate) => candidate.source.toLowerCase() === required.toLowerCase());
      const dataType = propertyRule?.dataType ?? 'float';
      mapping.properties.push({
        kind: 'value',
        target: propertyRule?.target ?? required,
        value: typeof fallback === 'boolean' ? fallback : coerceValue(fallback, dataType),
        dataType,
      });
      mapping.warnings.push(
        createDiagnostic(
          WarningCode.DEFAULT_VALUE_USED,
          `Using default value for required property '${required}': ${String(fallback)}`,
          subject,
        ),
      );
    }
  }
}
