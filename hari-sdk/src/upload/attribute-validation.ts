/**
 * Attribute Consistency Validation
 *
 * Attributes sharing a name and annotatable type must share one id and one
 * value type. List values must be homogeneous, also across attributes.
 */

import {
  AttributeValidationIdNotReusedError,
  AttributeValidationInconsistentListElementValueTypesError,
  AttributeValidationInconsistentListElementValueTypesMultipleAttributesError,
  AttributeValidationInconsistentValueTypeError,
} from '../errors';
import type { AttributeValue, ValueClassification } from '../types';
import type { HariAttribute } from './entities';

/**
 * Classify a value for consistency checks. Integers and floats are both
 * `number`; booleans are `bool`.
 */
export function classifyValue(value: AttributeValue): ValueClassification {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  switch (typeof value) {
    case 'number':
      return 'number';
    case 'boolean':
      return 'bool';
    default:
      return 'str';
  }
}

class AttributeGroupValidator {
  private readonly valueTypes = new Map<string, ValueClassification>();
  private readonly listElementTypes = new Map<string, ValueClassification>();
  private readonly ids = new Map<string, string>();

  constructor(private readonly annotatableType: string) {}

  validate(attribute: HariAttribute): void {
    const valueType = this.checkValueType(attribute);
    if (valueType === 'list' && Array.isArray(attribute.value)) {
      this.checkListElementTypes(attribute.name, attribute.value);
    }
    this.checkIdReuse(attribute);
  }

  private checkValueType(attribute: HariAttribute): ValueClassification {
    const valueType = classifyValue(attribute.value);
    // null matches any value type
    if (valueType === 'null') return valueType;

    const known = this.valueTypes.get(attribute.name);
    if (known === undefined) {
      this.valueTypes.set(attribute.name, valueType);
    } else if (known !== valueType) {
      throw new AttributeValidationInconsistentValueTypeError(attribute.name, this.annotatableType, [
        known,
        valueType,
      ]);
    }
    return valueType;
  }

  private checkListElementTypes(name: string, elements: AttributeValue[]): void {
    const found = new Set<ValueClassification>();
    for (const element of elements) {
      const elementType = classifyValue(element);
      if (elementType !== 'null') {
        found.add(elementType);
      }
    }
    if (found.size === 0) return;
    if (found.size > 1) {
      throw new AttributeValidationInconsistentListElementValueTypesError(name, this.annotatableType, [
        ...found,
      ]);
    }

    const [elementType] = found;
    const known = this.listElementTypes.get(name);
    if (known === undefined) {
      this.listElementTypes.set(name, elementType);
    } else if (known !== elementType) {
      throw new AttributeValidationInconsistentListElementValueTypesMultipleAttributesError(
        name,
        this.annotatableType,
        [known, elementType]
      );
    }
  }

  private checkIdReuse(attribute: HariAttribute): void {
    // missing ids are assigned per group after validation
    if (attribute.id === null) return;

    const known = this.ids.get(attribute.name);
    if (known === undefined) {
      this.ids.set(attribute.name, attribute.id);
    } else if (known !== attribute.id) {
      throw new AttributeValidationIdNotReusedError(attribute.name, this.annotatableType, [
        known,
        attribute.id,
      ]);
    }
  }
}

/**
 * Check attributes for consistency, grouped by annotatable type. Throws the
 * first violation found; runs entirely in memory.
 */
export function validateAttributes(attributes: readonly HariAttribute[]): void {
  const validators = new Map<string, AttributeGroupValidator>();
  for (const attribute of attributes) {
    const annotatableType = attribute.target.annotatableType ?? 'unassigned';
    let validator = validators.get(annotatableType);
    if (!validator) {
      validator = new AttributeGroupValidator(annotatableType);
      validators.set(annotatableType, validator);
    }
    validator.validate(attribute);
  }
}
