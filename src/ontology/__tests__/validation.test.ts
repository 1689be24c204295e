import { describe, expect, it } from 'vitest';
import { parseEntity, safeParseEntity } from '../validation.js';
import { OntologyError, ValidationError } from '../errors.js';
import { AgentCapabilitySchema } from '../layers/identity.js';

function captureValidationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('parseEntity', () => {
  it('returns parsed data with defaults filled', () => {
    const capability = parseEntity(AgentCapabilitySchema, { name: 'summarize' }, 'AgentCapability');
    expect(capability).toEqual({
      name: 'summarize',
      version: '1.0.0',
      parameters: {},
      constraints: {},
      enabled: true,
    });
  });

  it('names the entity and the missing field', () => {
    const error = captureValidationError(() => parseEntity(AgentCapabilitySchema, {}, 'AgentCapability'));
    expect(error).toBeInstanceOf(OntologyError);
    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('VALIDATION_FAILED');
    expect(error.entity).toBe('AgentCapability');
    expect(error.field).toBe('name');
    expect(error.message).toBe('Invalid AgentCapability: name: Required');
  });

  it('prefixes issue paths with the base path', () => {
    const error = captureValidationError(() =>
      parseEntity(AgentCapabilitySchema, { name: 1 }, 'AgentCapability', 'agent.capabilities.0'),
    );
    expect(error.field).toBe('agent.capabilities.0.name');
  });

  it('reports root-level type errors as (root)', () => {
    const error = captureValidationError(() => parseEntity(AgentCapabilitySchema, 'search', 'AgentCapability'));
    expect(error.issues).toEqual([{ path: '(root)', message: 'Expected object, received string' }]);
  });
});

describe('safeParseEntity', () => {
  it('returns success with data', () => {
    const result = safeParseEntity(AgentCapabilitySchema, { name: 'search' }, 'AgentCapability');
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.name).toBe('search');
    }
  });

  it('returns a ValidationError instead of throwing', () => {
    const result = safeParseEntity(AgentCapabilitySchema, { name: 'search', enabled: 'yes' }, 'AgentCapability');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.field).toBe('enabled');
    }
  });
});
