export {
  formatCompanyBlock,
  formatCompanyBlocks,
  renderDocument,
} from "./addressFormatter";
export { buildOutputFilename, writeOutputDocument } from "./fileWriter";
