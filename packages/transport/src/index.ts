export * from './errors';
export * from './logger';
export * from './config/options';
export * from './config/credentials';
export * from './transport/auth';
export * from './transport/socket';
export * from './reconnect/ReconnectionPolicy';
export * from './queue/OutboundQueue';
export * from './keepalive/KeepaliveMonitor';
export * from './connection/types';
export * from './connection/Connection';
export * from './shell/CommandChannel';
