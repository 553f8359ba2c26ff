/**
 * Error types raised by the mapper
 */

export class ConfigurationError extends Error {
  public readonly details?: {
    section?: string
    property?: string
    raw?: string
    kind?: string
    context?: Record<string, unknown>
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message)
    this.name = 'ConfigurationError'
    this.details = details
  }
}

/**
 * Raw text could not be turned into a value of the requested kind, or a value
 * could not be rendered for its kind.
 */
export class ConversionError extends ConfigurationError {
  constructor(message: string, details?: ConfigurationError['details']) {
    super(message, details)
    this.name = 'ConversionError'
  }
}

/**
 * Thrown by the strict raw getters (getBoolProperty / getIntProperty)
 */
export class PropertyParseError extends ConfigurationError {
  constructor(message: string, details?: ConfigurationError['details']) {
    super(message, details)
    this.name = 'PropertyParseError'
  }
}
