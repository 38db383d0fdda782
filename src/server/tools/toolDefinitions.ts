/**
 * Tool Definitions
 * Every operation exposed under POST /tools/:name, in function-calling form
 * so the same list can be handed to a model or listed over HTTP
 */

import { type FunctionDeclaration, Type } from '@google/genai';

export const TOOL_NAMES = [
  'local_backtest_strategy',
  'cloud_backtest',
  'push_project',
  'download_market_data',
  'backtest_status',
  'backtest_results',
  'project_status',
  'create_project',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface ToolDefinition {
  declaration: FunctionDeclaration;
  requireAuth: boolean;
}

const PROJECT_NAME = {
  type: Type.STRING,
  description: 'Cloud project name or id (e.g., "SPY Momentum Strategy")',
};

const BACKTEST_ID = {
  type: Type.STRING,
  description: 'Backtest id returned by cloud_backtest',
};

export const TOOL_DEFINITIONS: Record<ToolName, ToolDefinition> = {
  local_backtest_strategy: {
    requireAuth: false,
    declaration: {
      name: 'local_backtest_strategy',
      description: 'Run a local LEAN backtest from a natural language strategy description',
      parameters: {
        type: Type.OBJECT,
        properties: {
          strategy_description: {
            type: Type.STRING,
            description: 'Free text, e.g. "Backtest SPY with RSI < 30 from 2022-05-01"',
          },
        },
        required: ['strategy_description'],
      },
    },
  },

  cloud_backtest: {
    requireAuth: false,
    declaration: {
      name: 'cloud_backtest',
      description: 'Push a project to the cloud and start a backtest there',
      parameters: {
        type: Type.OBJECT,
        properties: {
          project_name: PROJECT_NAME,
          strategy_parameters: {
            type: Type.OBJECT,
            description: 'Strategy parameters; "symbol" (and "symbols") are checked against the allow-list',
          },
          backtest_name: {
            type: Type.STRING,
            description: 'Optional name for the cloud backtest run',
          },
        },
        required: ['project_name', 'strategy_parameters'],
      },
    },
  },

  push_project: {
    requireAuth: false,
    declaration: {
      name: 'push_project',
      description: 'Sync local project changes with the cloud',
      parameters: {
        type: Type.OBJECT,
        properties: { project_name: PROJECT_NAME },
        required: ['project_name'],
      },
    },
  },

  download_market_data: {
    requireAuth: false,
    declaration: {
      name: 'download_market_data',
      description: '(Not implemented) Fetch market data for a symbol',
      parameters: {
        type: Type.OBJECT,
        properties: {
          symbol: { type: Type.STRING },
          resolution: { type: Type.STRING },
          start_date: { type: Type.STRING },
          end_date: { type: Type.STRING },
        },
      },
    },
  },

  backtest_status: {
    requireAuth: false,
    declaration: {
      name: 'backtest_status',
      description: 'Check the status of a running cloud backtest',
      parameters: {
        type: Type.OBJECT,
        properties: { project_name: PROJECT_NAME, backtest_id: BACKTEST_ID },
        required: ['project_name', 'backtest_id'],
      },
    },
  },

  backtest_results: {
    requireAuth: false,
    declaration: {
      name: 'backtest_results',
      description: '(Not available yet) Fetch results of a finished cloud backtest',
      parameters: {
        type: Type.OBJECT,
        properties: { project_name: PROJECT_NAME, backtest_id: BACKTEST_ID },
        required: ['project_name', 'backtest_id'],
      },
    },
  },

  project_status: {
    requireAuth: false,
    declaration: {
      name: 'project_status',
      description: 'Get the current status of a cloud project',
      parameters: {
        type: Type.OBJECT,
        properties: { project_name: PROJECT_NAME },
        required: ['project_name'],
      },
    },
  },

  create_project: {
    requireAuth: true,
    declaration: {
      name: 'create_project',
      description: 'Create a new LEAN project',
      parameters: {
        type: Type.OBJECT,
        properties: {
          project_name: PROJECT_NAME,
          language: {
            type: Type.STRING,
            enum: ['python', 'csharp'],
            description: 'Project language (default: python)',
          },
        },
        required: ['project_name'],
      },
    },
  },
};

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}
