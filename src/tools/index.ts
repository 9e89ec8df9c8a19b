export { headerExtract } from './header-extract.js';
export { headerScan } from './header-scan.js';
export {
  validateHeaderPath,
  validateRootPath,
  requireStringArg,
} from './validation.js';
