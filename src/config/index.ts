export {
    DEFAULT_CODEC_PATH,
    DEFAULT_FILE_NAME_TEMPLATE,
    DEFAULT_PROTO_PATH,
    defaultFileName,
    fileNameFromTemplate,
    parseCodeReference,
    resolveOptions,
    type CodeReference,
    type FileNameFn,
    type GenerationOptions,
    type GenerationOptionsInput,
} from "./options";
export { loadConfigFile, parseConfig, type ConfigFile } from "./file";
