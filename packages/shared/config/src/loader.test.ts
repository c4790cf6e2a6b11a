import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { parseToml, loadConfig, findConfigFile, getConfigSearchPaths, ConfigLoadError } from './loader.js';

const SAMPLE = `
default_agent = "Architect"

[crewroom]
name = "test-room"
version = "1.0"

[agents.Architect]
provider = "anthropic"
model = "claude-3-5-sonnet"
api_key_env = "ANTHROPIC_API_KEY"
system_prompt = "You design systems."
temperature = 0.3

[agents.Coder]
provider = "openai"
model = "gpt-4o"
api_key_env = "OPENAI_API_KEY"
system_prompt = "You write code."
max_tokens = 8192
`;

describe('TOML Loader', () => {
  describe('parseToml', () => {
    it('should parse agents and top-level keys', () => {
      const config = parseToml(SAMPLE);

      expect(config.default_agent).toBe('Architect');
      expect(config.crewroom.name).toBe('test-room');
      expect(Object.keys(config.agents)).toEqual(['Architect', 'Coder']);
      expect(config.agents.Architect?.temperature).toBe(0.3);
      expect(config.agents.Coder?.max_tokens).toBe(8192);
    });

    it('should parse optional sections', () => {
      const config = parseToml(`
${SAMPLE}
[rate_limits.openai]
limit = 10
window = 30

[routing]
dispatch = "first"

[tools]
allowed_paths = ["/srv/project", "/tmp"]
`);

      expect(config.rate_limits?.openai).toEqual({ limit: 10, window: 30 });
      expect(config.routing?.dispatch).toBe('first');
      expect(config.tools?.allowed_paths).toEqual(['/srv/project', '/tmp']);
    });

    it('should throw ConfigLoadError for invalid TOML', () => {
      expect(() => parseToml('[crewroom\nname = "broken"')).toThrow(ConfigLoadError);
    });
  });

  describe('file discovery', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'crewroom-loader-'));
    });

    afterEach(() => {
      fs.rmSync(testDir, { recursive: true, force: true });
    });

    it('searches the working directory, then the home directory', () => {
      expect(getConfigSearchPaths({ HOME: '/home/tester' }, '/work')).toEqual([
        path.join('/work', 'crewroom.toml'),
        path.join('/home/tester', '.crewroom', 'crewroom.toml'),
      ]);
    });

    it('puts CREWROOM_CONFIG first, relative to the working directory', () => {
      const paths = getConfigSearchPaths({ HOME: '/home/tester', CREWROOM_CONFIG: 'conf/room.toml' }, '/work');
      expect(paths[0]).toBe(path.resolve('/work', 'conf/room.toml'));
      expect(paths).toHaveLength(3);
    });

    it('returns the first existing path', () => {
      const present = path.join(testDir, 'crewroom.toml');
      fs.writeFileSync(present, SAMPLE);

      expect(findConfigFile([path.join(testDir, 'missing.toml'), present])).toBe(present);
      expect(findConfigFile([path.join(testDir, 'missing.toml')])).toBeUndefined();
    });

    it('loads a custom path and reports where it came from', () => {
      const configPath = path.join(testDir, 'crewroom.toml');
      fs.writeFileSync(configPath, SAMPLE);

      const loaded = loadConfig(configPath);

      expect(loaded.config.default_agent).toBe('Architect');
      expect(loaded.path).toBe(path.resolve(configPath));
    });

    it('loads the file named by CREWROOM_CONFIG', () => {
      const configPath = path.join(testDir, 'room.toml');
      fs.writeFileSync(configPath, SAMPLE);

      expect(loadConfig(undefined, { CREWROOM_CONFIG: configPath }).path).toBe(configPath);
    });

    it('resolves relative allowed paths against the config directory', () => {
      const configPath = path.join(testDir, 'crewroom.toml');
      fs.writeFileSync(configPath, `${SAMPLE}\n[tools]\nallowed_paths = ["src", "/srv/shared"]\n`);

      expect(loadConfig(configPath).config.tools?.allowed_paths).toEqual([
        path.join(testDir, 'src'),
        '/srv/shared',
      ]);
    });

    it('fails for a missing custom path', () => {
      const missing = path.join(testDir, 'nope.toml');
      expect(() => loadConfig(missing)).toThrow(`Configuration file not found: ${missing}`);
    });
  });
});
