import type { AppConfigInput } from './schema';

export const config: AppConfigInput = {
  engine: {
    name: 'tk-host',
    debugLogging: false,
    watchEvents: ['document-opened', 'document-saved', 'document-created'],
  },

  engines: ['tk-host'],

  workspaces: [
    {
      projectId: 'shotA',
      root: '/proj/shotA',
      entityLevels: ['Sequence', 'Shot'],
    },
    {
      projectId: 'assets',
      root: '/proj/assets',
      entityLevels: ['AssetType', 'Asset'],
    },
  ],

  runtime: {
    logLevel: 'info',
  },
};
