import { resolveDbName, shouldUseMemoryStores } from '../database/mongo.js';
import { testEnv } from './helpers.js';

describe('mongo configuration', () => {
  it('falls back to in-memory stores for placeholder URIs outside production', () => {
    expect(shouldUseMemoryStores(testEnv({ MONGODB_URI: 'mongodb+srv://REPLACE_ME' }))).toBe(true);
    expect(shouldUseMemoryStores(testEnv({ MONGODB_URI: '<REPLACE_ME>' }))).toBe(true);
    expect(shouldUseMemoryStores(testEnv({ MONGODB_URI: 'mongodb://localhost:27017/desk' }))).toBe(false);
  });

  it('picks the database name', () => {
    expect(resolveDbName(testEnv({ MONGODB_URI: 'mongodb://localhost:27017/helpdesk' }))).toBeUndefined();
    expect(resolveDbName(testEnv({ MONGODB_URI: 'mongodb://localhost:27017' }))).toBe('service_desk');
    expect(resolveDbName(testEnv({ MONGODB_URI: 'mongodb://localhost:27017/test' }))).toBe('service_desk');
    expect(
      resolveDbName(testEnv({ MONGODB_URI: 'mongodb://localhost:27017/helpdesk', MONGODB_DBNAME: 'desk_staging' }))
    ).toBe('desk_staging');
  });
});
