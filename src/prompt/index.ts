export {
  buildPrompt,
  SYSTEM_PROMPT,
  OUTPUT_FORMAT_VERSION,
  COMPLAINT_OPEN,
  COMPLAINT_CLOSE
} from './builder.js';
