import type { Palette } from '../../colour/palette.js';
import { applySubstitutions, type SubstitutionRule } from '../../colour/substitution.js';
import type { TransformContext, Transformer } from '../../pipeline/transformerTypes.js';
import { stdoutText } from '../../tools/toolTypes.js';
import { artifactOutcome, matchesAnyCandidate, runTool, selectTool, writeArtifact } from '../support.js';

const headingRule = (palette: Palette): SubstitutionRule => ({
  pattern: /^([A-Z][A-Za-z ]*:)/,
  replace: ([, heading]) => palette.reportHeading(heading),
});

export const objectNameRule = (palette: Palette): SubstitutionRule => ({
  pattern: /(^| )([^. ]*\.o)\/?(:| |$)/g,
  replace: ([, lead, name, tail]) => `${lead}${palette.objectName(name)}${tail}`,
});

export interface ArchiveReport {
  title: string;
  files: string;
  symbols: string;
}

export const formatArchiveReport = ({ title, files, symbols }: ArchiveReport): string =>
  `${title}\n${'-'.repeat(title.length)}\n\nArchived files:\n${files}\n\nSymbols:\n${symbols}`;

async function listLibrary(context: TransformContext, tool: string): Promise<{ files: string; symbols: string }> {
  const files = await runTool(context, tool, ['-l', context.subject.path]);
  const symbols = await runTool(context, tool, ['-s', context.subject.path]);
  return { files: stdoutText(files), symbols: stdoutText(symbols) };
}

export const alfLibraryReformatter: Transformer = {
  id: 'alf-libfile',
  stage: 'reformat',
  description: 'RISC OS ALF libraries listed by riscos-libfile',
  async match(context) {
    const tool = await selectTool(context, ['riscos-libfile']);
    if (!tool || !matchesAnyCandidate(context, ['*.alf'])) {
      return null;
    }
    return {
      tool,
      async apply() {
        const listing = await listLibrary(context, tool);
        const report = formatArchiveReport({ title: 'RISC OS library archive', ...listing });
        const coloured = applySubstitutions(report, [headingRule(context.palette)]);
        return artifactOutcome(await writeArtifact(context, 'alf', coloured));
      },
    };
  },
};

const withoutUndefinedSymbols = (listing: string): string =>
  listing
    .split('\n')
    .filter((line) => !line.includes('  U '))
    .join('\n');

const AR_PLATFORMS: readonly NodeJS.Platform[] = ['darwin', 'linux'];

/** `ar` listings are only known for the platforms in AR_PLATFORMS; `match` checks first. */
async function listArArchive(context: TransformContext, tool: string): Promise<{ files: string; symbols: string }> {
  const path = context.subject.path;
  if (tool !== 'ar') {
    return listLibrary(context, tool);
  }
  if (context.config.platform === 'darwin') {
    const files = await runTool(context, 'ar', ['-tLv', path]);
    const symbols = await runTool(context, 'nm', ['-gU', path]);
    return { files: stdoutText(files), symbols: stdoutText(symbols) };
  }
  const files = await runTool(context, 'ar', ['tOv', path]);
  const symbols = await runTool(context, 'nm', ['-g', path]);
  return { files: stdoutText(files), symbols: withoutUndefinedSymbols(stdoutText(symbols)) };
}

export const arArchiveReformatter: Transformer = {
  id: 'ar-archive',
  stage: 'reformat',
  description: 'ar archives listed with their members and exported symbols',
  async match(context) {
    const tool = await selectTool(context, ['riscos64-libfile', 'ar']);
    if (!tool || !matchesAnyCandidate(context, ['*.a'])) {
      return null;
    }
    const platform = context.config.platform;
    if (tool === 'ar' && !AR_PLATFORMS.includes(platform)) {
      context.logger.debug(`no ar listing recipe for ${platform}`);
      return null;
    }
    return {
      tool,
      async apply() {
        const listing = await listArArchive(context, tool);
        const report = formatArchiveReport({ title: "'ar' archive", ...listing });
        const palette = context.palette;
        const coloured = applySubstitutions(report, [headingRule(palette), objectNameRule(palette)]);
        return artifactOutcome(await writeArtifact(context, 'a-text', coloured));
      },
    };
  },
};
