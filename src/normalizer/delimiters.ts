// Sequences a model could read as prompt structure rather than complaint text
const DELIMITER_PATTERNS: RegExp[] = [
  // Fences used by the prompt builder
  /<<</g,
  />>>/g,
  /```/g,

  // Chat-template tokens
  /<\|[^|<>]{0,32}\|>/g,
  /\[\/?INST\]/gi,
  /<<\/?SYS>>/gi,
  /\[\/?SYSTEM\]/gi,

  // Role headers
  /#{2,}\s*(Instruction|System|Human|Assistant|User)\s*:/gi
];

export function stripDelimiters(input: string): string {
  let current = input;
  let previous: string;

  // Removing one token can join its neighbours into another
  do {
    previous = current;
    for (const pattern of DELIMITER_PATTERNS) {
      current = current.replace(pattern, '');
    }
  } while (current !== previous);

  return current;
}
