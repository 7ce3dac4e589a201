export const INFERRED_KINDS = [
  'sh',
  'pl',
  'py',
  'xml',
  'elf-arm64',
  'aof',
  'arm',
  'alf',
  'macho',
  'plist',
  'pem',
  'csr',
  'crt',
  'a',
  'pyc',
  'yaml',
  'h',
  'lua',
] as const;

export type InferredKind = (typeof INFERRED_KINDS)[number];

export interface DescriptionRule {
  pattern: RegExp;
  kind: InferredKind;
}

// Checked in order against the `file` description; the first hit wins.
export const DESCRIPTION_RULES: readonly DescriptionRule[] = [
  { pattern: /shell script/, kind: 'sh' },
  { pattern: /[Pp]erl script/, kind: 'pl' },
  { pattern: /Python script/, kind: 'py' },
  { pattern: /XML document/, kind: 'xml' },
  { pattern: /ELF.*ARM aarch64/, kind: 'elf-arm64' },
  { pattern: /RISC OS.*AOF/, kind: 'aof' },
  { pattern: /RISC OS AIF/, kind: 'arm' },
  { pattern: /RISC OS.*ALF/, kind: 'alf' },
  { pattern: /Mach-O/, kind: 'macho' },
  { pattern: /Apple binary property list/, kind: 'plist' },
  { pattern: /OpenSSH private key/, kind: 'pem' },
  { pattern: /PEM certificate request/, kind: 'csr' },
  { pattern: /PEM certificate/, kind: 'crt' },
  { pattern: /ar archive/, kind: 'a' },
  { pattern: /python.*byte-compiled/, kind: 'pyc' },
];

export interface NameRule {
  patterns: readonly string[];
  /** `keep` leaves the content-derived kind untouched. */
  kind: InferredKind | 'keep';
}

export const NAME_RULES: readonly NameRule[] = [
  { patterns: ['*.txt'], kind: 'keep' },
  { patterns: ['*.key'], kind: 'pem' },
  { patterns: ['VersionNum', '*/VersionNum'], kind: 'h' },
  { patterns: ['*,18c', '*,18d'], kind: 'lua' },
];

export const kindSuffix = (kind: InferredKind): string => `.${kind}`;
