export {
  validateText,
  validateFiles,
  summarize,
  exitCodeFor,
  EXIT_CODES,
  type ExitCode,
} from './validate.js';
export { echoText, echoFile } from './echo.js';
