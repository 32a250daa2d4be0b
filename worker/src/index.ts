export * from './providers/gateway';
export * from './providers/openaiGateway';
export * from './requests';
export * from './results';
export * from './payload';
export * from './orchestrator';
export * from './dispatcher';
export * from './monitor';
export * from './scheduler';
