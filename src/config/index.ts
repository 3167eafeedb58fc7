export { loadConfig, parseClassificationCodes } from "./loadConfig";
