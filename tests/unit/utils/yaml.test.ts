/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { formatZodError, loadYamlWithSchema, parseYaml, parseYamlWithSchema } from '../../../src/utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const Schema = z.object({
  service_url: z.string(),
  timeout_ms: z.number().int().positive().default(30000),
});

describe('parseYaml', () => {
  it('should parse valid YAML', () => {
    expect(parseYaml('service_url: https://generator.test\ntimeout_ms: 500\n')).toEqual({
      service_url: 'https://generator.test',
      timeout_ms: 500,
    });
  });

  it('should return null for empty content', () => {
    expect(parseYaml('')).toBeNull();
  });

  it('should throw ConfigError for invalid YAML', () => {
    let error: unknown;
    try {
      parseYaml('defaults: [unclosed');
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: ErrorCodes.CONFIG_LOAD_ERROR });
    expect(error instanceof Error && error.message.startsWith('Failed to parse YAML: ')).toBe(true);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('service_url: https://generator.test', Schema)).toEqual({
      service_url: 'https://generator.test',
      timeout_ms: 30000,
    });
  });

  it('should report the failing path', () => {
    expect(() => parseYamlWithSchema('service_url: x\ntimeout_ms: -1', Schema)).toThrow(
      /^YAML validation failed: timeout_ms: /
    );
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should read and validate the file', async () => {
    mockReadFile.mockResolvedValue('service_url: https://generator.test\n');

    const config = await loadYamlWithSchema('/project/.springinit.yaml', Schema);

    expect(config.service_url).toBe('https://generator.test');
    expect(mockReadFile).toHaveBeenCalledWith('/project/.springinit.yaml');
  });

  it('should name the file in validation errors', async () => {
    mockReadFile.mockResolvedValue('timeout_ms: 10\n');

    await expect(loadYamlWithSchema('/project/.springinit.yaml', Schema)).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_INVALID,
      message: expect.stringMatching(/^\/project\/\.springinit\.yaml validation failed: service_url: /),
      details: expect.objectContaining({ source: '/project/.springinit.yaml' }),
    });
  });

  it('should name the file in parse errors', async () => {
    mockReadFile.mockResolvedValue('service_url: [unclosed\n');

    await expect(loadYamlWithSchema('/project/.springinit.yaml', Schema)).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_LOAD_ERROR,
      message: expect.stringMatching(/^Failed to parse \/project\/\.springinit\.yaml: /),
    });
  });

  it('should wrap read failures', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT'));

    await expect(loadYamlWithSchema('/project/missing.yaml', Schema)).rejects.toMatchObject({
      name: 'ConfigError',
      code: ErrorCodes.CONFIG_LOAD_ERROR,
      message: 'Failed to load YAML file: /project/missing.yaml',
    });
  });
});

describe('formatZodError', () => {
  it('should join issues with their paths', () => {
    const result = z.object({ defaults: z.object({ dependencies: z.array(z.string()) }) }).safeParse({
      defaults: { dependencies: [1] },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toMatch(/^defaults\.dependencies\.0: /);
    }
  });
});
