export * from './schema';
export {
    ConfigError,
    configFilePath,
    environmentValues,
    mergeConfig,
    parseConfigFile,
    readConfigFile,
    secureValues,
} from './loader';
