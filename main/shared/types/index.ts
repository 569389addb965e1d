// Plain-data types shared by the engine, storage and transports

export * from './activity';
export * from './rules';
export * from './state';
export * from './steps';
