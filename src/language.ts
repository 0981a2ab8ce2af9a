import * as path from 'path';

const EXTENSION_LANGUAGES: Record<string, string> = {
  '.py': 'python',
  '.js': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.java': 'java',
  '.kt': 'kotlin',
  '.scala': 'scala',
  '.c': 'c',
  '.h': 'c',
  '.cc': 'cpp',
  '.cpp': 'cpp',
  '.hpp': 'cpp',
  '.cs': 'csharp',
  '.go': 'go',
  '.rs': 'rust',
  '.rb': 'ruby',
  '.php': 'php',
  '.swift': 'swift',
  '.sh': 'bash',
  '.sql': 'sql',
};

export function detectLanguage(filePath: string): string {
  return EXTENSION_LANGUAGES[path.extname(filePath).toLowerCase()] ?? 'text';
}

/** Fenced code block info string for a language name such as "C++" or "Python". */
export function fenceTag(language: string): string {
  const normalized = language.trim().toLowerCase();
  if (normalized === 'c++') return 'cpp';
  if (normalized === 'c#') return 'csharp';
  return normalized.replace(/\s+/g, '-');
}
