// Mock DependencyInjectionService before importing
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigCommand } from './config-command';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { Config } from '@pushgate/core';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

describe('ConfigCommand', () => {
  let tempDir: string;
  let mockDependencyService: {
    configure: jest.Mock;
    getConfigManager: jest.Mock;
  };
  let configCommand: ConfigCommand;

  beforeEach(() => {
    jest.clearAllMocks();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pushgate-config-cmd-'));

    mockDependencyService = {
      configure: jest.fn(),
      getConfigManager: jest.fn().mockImplementation(async () =>
        new Config.ConfigManager({ projectRoot: tempDir })
      ),
    };

    (DependencyInjectionService.getInstance as jest.MockedFunction<typeof DependencyInjectionService.getInstance>)
      .mockReturnValue(mockDependencyService as never);

    configCommand = new ConfigCommand();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('show', () => {
    it('should print the merged configuration and its source as JSON', async () => {
      const configPath = path.join(tempDir, 'pushgate.yaml');
      fs.writeFileSync(configPath, 'override:\n  commitBanner: Push Override\n');

      await configCommand.execute({ action: 'show', json: true });

      const expected = Config.createDefaultConfig();
      expected.override.commitBanner = 'Push Override';
      expect(mockConsoleLog).toHaveBeenCalledWith(JSON.stringify({
        success: true,
        data: { source: configPath, config: expected },
      }, null, 2));
    });

    it('should print the defaults as YAML when no config file exists', async () => {
      await configCommand.execute({ action: 'show' });

      expect(mockConsoleLog).toHaveBeenNthCalledWith(1, '# source: built-in defaults');
      const yamlText = String(mockConsoleLog.mock.calls[1]?.[0]);
      expect(Config.parseConfigFile('shown.yaml', yamlText)).toEqual(Config.createDefaultConfig());
    });

    it('should pass repo and config paths to the container', async () => {
      await configCommand.execute({ action: 'show', repo: '/work/repo', config: '/work/repo/custom.yaml' });

      expect(mockDependencyService.configure).toHaveBeenCalledWith({
        repo: '/work/repo',
        config: '/work/repo/custom.yaml',
      });
    });
  });

  describe('init', () => {
    it('should write pushgate.yaml with the default configuration', async () => {
      await configCommand.execute({ action: 'init' });

      const target = path.join(tempDir, 'pushgate.yaml');
      expect(mockConsoleLog).toHaveBeenCalledWith(`✅ Wrote default configuration to ${target}`);
      expect(Config.parseConfigFile(target, fs.readFileSync(target, 'utf-8')))
        .toEqual(Config.createDefaultConfig());
    });

    it('should refuse to overwrite an existing file without --force', async () => {
      const target = path.join(tempDir, 'pushgate.yaml');
      fs.writeFileSync(target, 'output:\n  format: json\n');

      await configCommand.execute({ action: 'init' });

      expect(mockConsoleError).toHaveBeenCalledWith(
        `❌ Invalid config ${target}: file already exists (use force to overwrite)`
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(fs.readFileSync(target, 'utf-8')).toBe('output:\n  format: json\n');
    });

    it('should overwrite an existing file with --force', async () => {
      const target = path.join(tempDir, 'pushgate.yaml');
      fs.writeFileSync(target, 'output:\n  format: json\n');

      await configCommand.execute({ action: 'init', force: true });

      expect(mockProcessExit).not.toHaveBeenCalled();
      expect(Config.parseConfigFile(target, fs.readFileSync(target, 'utf-8')))
        .toEqual(Config.createDefaultConfig());
    });
  });

  it('should reject unknown actions', async () => {
    await configCommand.execute({ action: 'reset' });

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Unknown config action: reset (expected show or init)');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
    expect(mockDependencyService.getConfigManager).not.toHaveBeenCalled();
  });
});
