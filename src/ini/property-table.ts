/**
 * Raw Property Table - section name -> (property name -> raw string)
 *
 * Insertion ordered, so leftover sections are written back in the order they
 * were read.
 */

export type RawSection = Map<string, string>

export class RawPropertyTable {
  private sections = new Map<string, RawSection>()

  hasSection(section: string): boolean {
    return this.sections.has(section)
  }

  getSection(section: string): ReadonlyMap<string, string> | undefined {
    return this.sections.get(section)
  }

  /**
   * Get the partition for a section, creating an empty one if needed
   */
  ensureSection(section: string): RawSection {
    let properties = this.sections.get(section)
    if (!properties) {
      properties = new Map()
      this.sections.set(section, properties)
    }
    return properties
  }

  has(section: string, name: string): boolean {
    return this.sections.get(section)?.has(name) ?? false
  }

  get(section: string, name: string): string | undefined {
    return this.sections.get(section)?.get(name)
  }

  /**
   * Insert or overwrite a property, creating the section if needed
   */
  set(section: string, name: string, value: string): void {
    this.ensureSection(section).set(name, value)
  }

  /**
   * Overwrite a property of an existing section
   * @returns false when the section does not exist
   */
  change(section: string, name: string, value: string): boolean {
    const properties = this.sections.get(section)
    if (!properties) {
      return false
    }
    properties.set(name, value)
    return true
  }

  delete(section: string, name: string): boolean {
    return this.sections.get(section)?.delete(name) ?? false
  }

  sectionNames(): string[] {
    return Array.from(this.sections.keys())
  }

  entries(): IterableIterator<[string, RawSection]> {
    return this.sections.entries()
  }

  clear(): void {
    this.sections.clear()
  }
}
