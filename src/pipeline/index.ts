export { runExtraction } from "./runExtraction";
export { runCli } from "./runCli";
