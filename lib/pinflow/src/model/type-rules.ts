/**
 * Wildcard data type accepted by and assignable to every other type
 */
export const ANY_TYPE = 'any';

/**
 * Data type compatibility between an output pin and an input pin.
 *
 * Identical names are always compatible, `any` on either side is compatible,
 * and extra directional pairs can be allowed explicitly:
 *
 * @example
 * ```typescript
 * const rules = new TypeRules().allow('int', 'float');
 * rules.isCompatible('int', 'float'); // true
 * rules.isCompatible('float', 'int'); // false
 * ```
 */
export class TypeRules {
  private readonly conversions = new Map<string, Set<string>>();

  /**
   * Allows values of sourceType to flow into pins of targetType
   */
  allow(sourceType: string, targetType: string): this {
    const targets = this.conversions.get(sourceType) ?? new Set<string>();
    targets.add(targetType);
    this.conversions.set(sourceType, targets);
    return this;
  }

  isCompatible(sourceType: string, targetType: string): boolean {
    if (sourceType === ANY_TYPE || targetType === ANY_TYPE || sourceType === targetType) {
      return true;
    }
    return this.conversions.get(sourceType)?.has(targetType) ?? false;
  }
}

export const DEFAULT_TYPE_RULES: TypeRules = new TypeRules();
