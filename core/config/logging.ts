import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // File configuration, used only when TRIALKIT_LOG_FILE is set
  files: {
    maxSize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true
  },

  defaultLevel: 'warn',

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    expression: {
      level: 'warn'
    },
    namespace: {
      level: 'warn'
    },
    choice: {
      level: 'warn'
    },
    controller: {
      level: 'info'
    },
    paradigm: {
      level: 'warn'
    },
    selector: {
      level: 'warn'
    },
    data: {
      level: 'warn'
    },
    config: {
      level: 'warn'
    },
    cli: {
      level: 'warn'
    }
  }
} as const;

export type LoggerServiceName = keyof typeof loggingConfig.services;
