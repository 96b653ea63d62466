/**
 * Field option cache for the configured project.
 *
 * Maps field names to option names to option IDs for Projects V2
 * single-select fields. Populated once per process by ProjectClient and
 * read-only afterwards; there is only one thread of control, so no
 * locking is needed.
 */

import type { ProjectV2SingleSelectField } from "../types.js";

export class FieldOptionCache {
  private fields = new Map<string, Map<string, string>>();
  private fieldIds = new Map<string, string>();
  private populated = false;

  /**
   * Populate the cache from project field data. Later calls are ignored.
   */
  populate(fields: ProjectV2SingleSelectField[]): void {
    if (this.populated) return;

    for (const field of fields) {
      this.fieldIds.set(field.name, field.id);
      const optionMap = new Map<string, string>();
      for (const option of field.options) {
        optionMap.set(option.name, option.id);
      }
      this.fields.set(field.name, optionMap);
    }
    this.populated = true;
  }

  isPopulated(): boolean {
    return this.populated;
  }

  /**
   * Resolve an option name to its ID for a given field.
   * Returns undefined if field or option not found.
   */
  resolveOptionId(fieldName: string, optionName: string): string | undefined {
    return this.fields.get(fieldName)?.get(optionName);
  }

  getFieldId(fieldName: string): string | undefined {
    return this.fieldIds.get(fieldName);
  }

  /**
   * Get all option names for a field.
   */
  getOptionNames(fieldName: string): string[] {
    const optionMap = this.fields.get(fieldName);
    return optionMap ? Array.from(optionMap.keys()) : [];
  }

  getFieldNames(): string[] {
    return Array.from(this.fieldIds.keys());
  }
}
