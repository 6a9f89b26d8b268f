// Structured logging for principal-sync
import pino, { type Logger, type LoggerOptions, type DestinationStream, type Level } from 'pino';
import { getLoggingConfig, LoggingConfig } from '../config';

export type { Logger } from 'pino';

/** Paths never written to a log line */
export const REDACTED_PATHS = [
    'clientSecret',
    'accessToken',
    'azure.clientSecret',
    '*.clientSecret',
    '*.accessToken'
];

/**
 * Create a Pino logger from the logging configuration.
 * Console output goes to stderr so command output on stdout stays parseable.
 */
export function createLogger( config: LoggingConfig, name = 'principal-sync' ): Logger {
    const options: LoggerOptions = {
        name,
        redact: { paths: REDACTED_PATHS, censor: '***masked***' },
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
            level: ( label ) => ( { level: label } )
        }
    };

    if ( config.level === 'silent' || ( !config.enableConsole && !config.file ) ) {
        return pino( { ...options, level: 'silent' } );
    }

    const level: Level = config.level;
    const streams: Array<{ stream: DestinationStream; level: Level }> = [];
    if ( config.enableConsole ) {
        streams.push( { stream: pino.destination( 2 ), level } );
    }
    if ( config.file ) {
        streams.push( { stream: pino.destination( { dest: config.file, mkdir: true, sync: true } ), level } );
    }

    const destination: DestinationStream = streams.length === 1
        ? streams[ 0 ].stream
        : pino.multistream( streams );

    return pino( { ...options, level }, destination );
}

let defaultLogger: Logger | undefined;

/**
 * Get the process-wide logger, built lazily from the loaded configuration
 */
export function getLogger(): Logger {
    if ( !defaultLogger ) {
        defaultLogger = createLogger( getLoggingConfig() );
    }
    return defaultLogger;
}

/**
 * Replace the process-wide logger
 */
export function setLogger( logger: Logger ): void {
    defaultLogger = logger;
}

/**
 * Child logger bound to a component name
 */
export function componentLogger( component: string, parent?: Logger ): Logger {
    return ( parent ?? getLogger() ).child( { component } );
}
