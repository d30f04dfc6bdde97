import { homedir } from 'os';
import { join, resolve } from 'path';
import { loadSettings } from '../../config/settings';

describe('loadSettings', () => {
  it('applies defaults under the data directory', () => {
    const settings = loadSettings({});
    const dataDir = resolve(process.cwd(), 'data');

    expect(settings).toEqual({
      dataDir,
      goalsFile: join(dataDir, 'state', 'goals.json'),
      landmarksFile: join(dataDir, 'landmarks.json'),
      typeChartFile: join(dataDir, 'type-chart.json'),
      speciesTypesFile: join(dataDir, 'species-types.json'),
      moveTypesFile: join(dataDir, 'move-types.json'),
      progressionFile: join(dataDir, 'progression.json'),
      worldSnapshotFile: join(dataDir, 'state', 'world-snapshot.json'),
      port: 3000,
      planningReviewInterval: 25,
      saveReminderInterval: 50
    });
  });

  it('reads overrides and expands the home directory', () => {
    const settings = loadSettings({
      ADVISOR_DATA_DIR: '~/advisor',
      GOALS_FILE: '/tmp/goals.json',
      PORT: '8080',
      PLANNING_REVIEW_INTERVAL: '10'
    });

    expect(settings.dataDir).toBe(join(homedir(), 'advisor'));
    expect(settings.landmarksFile).toBe(join(homedir(), 'advisor', 'landmarks.json'));
    expect(settings.goalsFile).toBe('/tmp/goals.json');
    expect(settings.port).toBe(8080);
    expect(settings.planningReviewInterval).toBe(10);
  });

  it('names the offending variable when a value is invalid', () => {
    expect(() => loadSettings({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT: /);
    expect(() => loadSettings({ SAVE_REMINDER_INTERVAL: '0' })).toThrow(
      'Invalid configuration: SAVE_REMINDER_INTERVAL: Number must be greater than or equal to 1'
    );
  });
});
