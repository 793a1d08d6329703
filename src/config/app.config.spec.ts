import * as path from 'path';
import { ConfigError, loadAppConfig } from './app.config';

describe('loadAppConfig', () => {
  it('defaults to in-memory storage on port 3000', () => {
    expect(loadAppConfig({})).toEqual({
      port: 3000,
      nodeEnv: 'development',
      storageDriver: 'memory',
      supabaseUrl: undefined,
      supabaseKey: undefined,
      intentsPath: path.resolve('data', 'intents.json'),
    });
  });

  it('picks Supabase when its credentials are present', () => {
    const config = loadAppConfig({ SUPABASE_URL: 'http://localhost:54321', SUPABASE_KEY: 'test-secret', PORT: '8080' });
    expect(config).toMatchObject({ storageDriver: 'supabase', port: 8080, supabaseKey: 'test-secret' });
  });

  it('lets STORAGE_DRIVER force memory', () => {
    const config = loadAppConfig({ SUPABASE_URL: 'http://localhost:54321', SUPABASE_KEY: 'test-secret', STORAGE_DRIVER: 'Memory' });
    expect(config.storageDriver).toBe('memory');
  });

  it('rejects invalid settings', () => {
    expect(() => loadAppConfig({ PORT: 'abc' })).toThrow(ConfigError);
    expect(() => loadAppConfig({ STORAGE_DRIVER: 'mongo' })).toThrow('Unknown STORAGE_DRIVER "mongo"');
    expect(() => loadAppConfig({ STORAGE_DRIVER: 'supabase' })).toThrow(
      'STORAGE_DRIVER=supabase needs SUPABASE_URL and SUPABASE_KEY',
    );
  });
});
