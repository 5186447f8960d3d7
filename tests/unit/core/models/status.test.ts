import { describe, it, expect } from 'vitest';
import {
  Status,
  STATUSES,
  StatusSchema,
  isStatus,
  parseStatus,
  statusLabel,
  statusName,
} from '../../../../src/core/models/status.js';
import { ValidationError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('Status', () => {
  it('should map each variant to its label', () => {
    expect(Status.ACTIVE).toBe('active');
    expect(Status.INACTIVE).toBe('inactive');
  });

  it('should keep the two variants distinct', () => {
    expect(Status.ACTIVE).not.toBe(Status.INACTIVE);
  });

  it('should be closed to exactly two variants', () => {
    expect(Object.keys(Status)).toEqual(['ACTIVE', 'INACTIVE']);
    expect(STATUSES).toEqual(['active', 'inactive']);
    expect(Object.isFrozen(Status)).toBe(true);
  });

  it('should expose the labels through the schema', () => {
    expect(StatusSchema.options).toEqual(['active', 'inactive']);
  });
});

describe('parseStatus', () => {
  it('should resolve known labels', () => {
    expect(parseStatus('active')).toBe(Status.ACTIVE);
    expect(parseStatus('inactive')).toBe(Status.INACTIVE);
  });

  it('should reject an unknown label', () => {
    let thrown: unknown;
    try {
      parseStatus('archived');
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ValidationError);
    expect(thrown).toMatchObject({
      code: ErrorCodes.INVALID_STATUS,
      message: 'Unknown status "archived". Valid statuses: active, inactive',
      details: { label: 'archived', valid: ['active', 'inactive'] },
    });
  });

  it('should be case-sensitive', () => {
    expect(() => parseStatus('ACTIVE')).toThrow(ValidationError);
  });
});

describe('isStatus', () => {
  it('should accept labels and reject everything else', () => {
    expect(isStatus('active')).toBe(true);
    expect(isStatus('inactive')).toBe(true);
    expect(isStatus('pending')).toBe(false);
    expect(isStatus(1)).toBe(false);
    expect(isStatus(undefined)).toBe(false);
  });
});

describe('statusLabel / statusName', () => {
  it('should look up label and variant name', () => {
    expect(statusLabel(Status.INACTIVE)).toBe('inactive');
    expect(statusName(Status.ACTIVE)).toBe('ACTIVE');
    expect(statusName(Status.INACTIVE)).toBe('INACTIVE');
  });
});
