/**
 * Tests for runtime validation
 */

import { describe, it, expect } from 'vitest';
import { Type } from '@sinclair/typebox';
import {
  validateOrThrow,
  validateAgentProfile,
  validateMessageInput,
  validateAgentName,
} from './validation.js';
import { CrewroomError, CrewroomErrorCodes } from './errors.js';

describe('validateOrThrow', () => {
  it('should return typed data when valid', () => {
    const data = validateOrThrow(Type.String(), 'ok');
    expect(data).toBe('ok');
  });

  it('should throw a validation error with the component', () => {
    try {
      validateOrThrow(Type.Number(), 'nope', 'config');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CrewroomError);
      const crewroomError = error as CrewroomError;
      expect(crewroomError.code).toBe(CrewroomErrorCodes.VALIDATION);
      expect(crewroomError.component).toBe('config');
      expect(crewroomError.message.startsWith('Validation failed: /:')).toBe(true);
    }
  });
});

describe('validateAgentProfile', () => {
  const profile = {
    name: 'Coder',
    provider: 'openai',
    model: 'gpt-4o',
    systemPrompt: 'You write code.',
    temperature: 0.5,
    maxTokens: 4096,
    apiKeyEnv: 'OPENAI_API_KEY',
  };

  it('should return valid profiles unchanged', () => {
    expect(validateAgentProfile(profile)).toEqual(profile);
  });

  it('should reject out-of-range temperatures under the config component', () => {
    expect(() => validateAgentProfile({ ...profile, temperature: 3 })).toThrow(/\/temperature/);
    try {
      validateAgentProfile({ ...profile, temperature: 3 });
      expect.unreachable();
    } catch (error) {
      expect((error as CrewroomError).component).toBe('config');
    }
  });

  it('should reject names with spaces and non-integer token limits', () => {
    expect(() => validateAgentProfile({ ...profile, name: 'has space' })).toThrow(/\/name/);
    expect(() => validateAgentProfile({ ...profile, maxTokens: 1.5 })).toThrow(/\/maxTokens/);
  });
});

describe('validateMessageInput', () => {
  it('should accept ordinary messages', () => {
    expect(validateMessageInput('Hello, @Architect!')).toEqual({
      content: 'Hello, @Architect!',
      agentTag: undefined,
    });
  });

  it('should collapse long runs of newlines', () => {
    expect(validateMessageInput('Hello\n\n\n\n\nworld').content).toBe('Hello\n\n\nworld');
  });

  it('should reject empty content', () => {
    expect(() => validateMessageInput('')).toThrow(CrewroomError);
  });

  it('should reject null bytes', () => {
    expect(() => validateMessageInput('a\0b')).toThrow('Message cannot contain null bytes');
  });

  it('should reject too many lines', () => {
    const content = Array.from({ length: 1001 }, () => 'x').join('\n');
    expect(() => validateMessageInput(content)).toThrow('Message cannot exceed 1000 lines');
  });

  it('should reject malformed agent tags', () => {
    expect(() => validateMessageInput('hi', 'bad tag')).toThrow(CrewroomError);
    expect(validateMessageInput('hi', 'Coder_2').agentTag).toBe('Coder_2');
  });
});

describe('validateAgentName', () => {
  it('should accept letters, digits, hyphens and underscores', () => {
    expect(validateAgentName('Coder_2-b')).toBe('Coder_2-b');
  });

  it('should reject path-like and empty names', () => {
    expect(() => validateAgentName('Arch/itect')).toThrow(CrewroomError);
    expect(() => validateAgentName('')).toThrow(CrewroomError);
  });
});
