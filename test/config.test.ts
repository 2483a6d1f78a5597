import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  API_KEY_ENV,
  CONFIG_FILE_NAME,
  DEFAULT_API_URL,
  DEFAULT_MODEL,
  getConfigPath,
  getConfigValue,
  loadConfig,
  parseConfigKey,
  readConfigFile,
  saveConfig,
  setConfigValue,
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';

const TEST_DIR = join(tmpdir(), 'commitcraft-test-config');

function createConfig(content: string, name = 'config.json'): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

before(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

after(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('getConfigPath', () => {
  it('ホームディレクトリ直下のファイルを指す', () => {
    assert.equal(getConfigPath('/home/dev'), join('/home/dev', CONFIG_FILE_NAME));
  });
});

describe('readConfigFile', () => {
  it('存在しないファイルはデフォルト値を返す', () => {
    const config = readConfigFile(join(TEST_DIR, 'nonexistent.json'));
    assert.deepEqual(config, { apiKey: '', apiUrl: DEFAULT_API_URL, defaultModel: DEFAULT_MODEL });
  });

  it('保存された値を読む', () => {
    const configPath = createConfig(
      JSON.stringify({
        api_key: 'test-key',
        api_url: 'https://proxy.example.test/v1/chat/completions',
        default_model: 'mistralai/mistral-7b-instruct',
      }),
    );
    assert.deepEqual(readConfigFile(configPath), {
      apiKey: 'test-key',
      apiUrl: 'https://proxy.example.test/v1/chat/completions',
      defaultModel: 'mistralai/mistral-7b-instruct',
    });
  });

  it('空文字列と欠けたキーはデフォルト値になる', () => {
    const configPath = createConfig(JSON.stringify({ api_url: '', default_model: '' }));
    assert.deepEqual(readConfigFile(configPath), {
      apiKey: '',
      apiUrl: DEFAULT_API_URL,
      defaultModel: DEFAULT_MODEL,
    });
  });

  it('不正なJSONはデフォルト値を返す', () => {
    const configPath = createConfig('{ api_key: ');
    assert.equal(readConfigFile(configPath).apiUrl, DEFAULT_API_URL);
  });

  it('文字列以外の値はデフォルト値を返す', () => {
    const configPath = createConfig(JSON.stringify({ api_key: 'test-key', default_model: 42 }));
    assert.deepEqual(readConfigFile(configPath), {
      apiKey: '',
      apiUrl: DEFAULT_API_URL,
      defaultModel: DEFAULT_MODEL,
    });
  });

  it('未知のキーは無視する', () => {
    const configPath = createConfig(JSON.stringify({ default_model: 'm', theme: 'dark' }));
    assert.equal(readConfigFile(configPath).defaultModel, 'm');
  });

  it('返す設定は変更不可', () => {
    assert.ok(Object.isFrozen(readConfigFile(join(TEST_DIR, 'nonexistent.json'))));
  });
});

describe('loadConfig', () => {
  it('環境変数のAPIキーがファイルの値より優先される', () => {
    const configPath = createConfig(JSON.stringify({ api_key: 'file-key' }), 'env.json');
    const config = loadConfig({ configPath, env: { [API_KEY_ENV]: 'env-key' } });
    assert.equal(config.apiKey, 'env-key');
  });

  it('環境変数が空ならファイルの値を使う', () => {
    const configPath = createConfig(JSON.stringify({ api_key: 'file-key' }), 'env-empty.json');
    const config = loadConfig({ configPath, env: { [API_KEY_ENV]: '' } });
    assert.equal(config.apiKey, 'file-key');
  });

  it('ファイルがなくても環境変数のキーとデフォルト値を返す', () => {
    const config = loadConfig({
      configPath: join(TEST_DIR, 'nonexistent.json'),
      env: { [API_KEY_ENV]: 'env-key' },
    });
    assert.deepEqual(config, { apiKey: 'env-key', apiUrl: DEFAULT_API_URL, defaultModel: DEFAULT_MODEL });
  });
});

describe('saveConfig', () => {
  it('3つのキーをインデント付きJSONで書き出す', () => {
    const configPath = join(TEST_DIR, 'saved.json');
    saveConfig({ apiKey: 'test-key', apiUrl: 'https://proxy.example.test', defaultModel: 'm' }, configPath);
    assert.equal(
      readFileSync(configPath, 'utf-8'),
      '{\n  "api_key": "test-key",\n  "api_url": "https://proxy.example.test",\n  "default_model": "m"\n}',
    );
  });

  it('空のURLとモデルはデフォルト値で保存する', () => {
    const configPath = join(TEST_DIR, 'saved-defaults.json');
    saveConfig({ apiKey: '', apiUrl: '', defaultModel: '' }, configPath);
    assert.deepEqual(JSON.parse(readFileSync(configPath, 'utf-8')), {
      api_key: '',
      api_url: DEFAULT_API_URL,
      default_model: DEFAULT_MODEL,
    });
  });

  it('環境変数のキーはファイルに書き戻されない', () => {
    const configPath = join(TEST_DIR, 'no-env.json');
    // what `set default_model` does: edit the file view, not the resolved one
    const updated = setConfigValue(readConfigFile(configPath), 'default_model', 'openai/gpt-4o-mini');
    saveConfig(updated, configPath);
    const resolved = loadConfig({ configPath, env: { [API_KEY_ENV]: 'env-key' } });
    assert.equal(resolved.apiKey, 'env-key');
    assert.equal(JSON.parse(readFileSync(configPath, 'utf-8')).api_key, '');
  });
});

describe('setConfigValue / getConfigValue', () => {
  const base = readConfigFile(join(TEST_DIR, 'nonexistent.json'));

  it('各キーを更新して元の設定は変えない', () => {
    const updated = setConfigValue(base, 'api_key', 'test-key');
    assert.equal(getConfigValue(updated, 'api_key'), 'test-key');
    assert.equal(getConfigValue(base, 'api_key'), '');
    assert.equal(getConfigValue(setConfigValue(base, 'api_url', 'https://x.test'), 'api_url'), 'https://x.test');
    assert.equal(getConfigValue(setConfigValue(base, 'default_model', 'm'), 'default_model'), 'm');
  });

  it('空のAPIキーは拒否する', () => {
    assert.throws(() => setConfigValue(base, 'api_key', ''), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.equal(err.message, 'Invalid API key: API key cannot be empty');
      return true;
    });
  });

  it('空のAPI URLは拒否する', () => {
    assert.throws(() => setConfigValue(base, 'api_url', ''), ConfigError);
  });

  it('空のモデルはデフォルトに戻る', () => {
    const updated = setConfigValue(setConfigValue(base, 'default_model', 'm'), 'default_model', '');
    assert.equal(updated.defaultModel, DEFAULT_MODEL);
  });
});

describe('parseConfigKey', () => {
  it('有効なキーはそのまま返す', () => {
    assert.equal(parseConfigKey('api_url'), 'api_url');
  });

  it('未知のキーは有効なキー一覧付きで拒否する', () => {
    assert.throws(() => parseConfigKey('token'), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.equal(
        err.message,
        'Unknown configuration key: token. Valid keys are: api_key, api_url, default_model',
      );
      return true;
    });
  });
});
