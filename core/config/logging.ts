import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // File configuration
  files: {
    directory: 'logs',
    mainLog: 'fragmerge.log',
    errorLog: 'error.log',
    maxSize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true
  },

  // Format configuration
  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    scanner: {
      level: 'error'
    },
    graph: {
      level: 'error'
    },
    order: {
      level: 'error'
    },
    substitution: {
      level: 'error'
    },
    engine: {
      level: 'error'
    },
    loader: {
      level: 'error'
    },
    config: {
      level: 'warn'
    },
    cli: {
      level: 'error'
    }
  }
} as const;

export type ServiceName = keyof typeof loggingConfig.services;
