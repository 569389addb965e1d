/**
 * validate subcommand for turnstack CLI
 *
 * Usage:
 *   turnstack validate <dialogs.yaml>
 */

import { loadDialogsFile } from '../declarative';
import { DefaultExpressionEvaluator } from '../expr/evaluate';
import { TemplateLanguageGenerator } from '../lg';

function showHelp(): void {
  console.log('Usage: turnstack validate <dialogs.yaml>');
  console.log('');
  console.log('Parse a dialogs file and check every dialog reference, memory path,');
  console.log('expression and template. Exits non-zero on the first problem.');
}

export async function main(argv: string[]): Promise<void> {
  if (argv.includes('--help') || argv.includes('-h')) {
    showHelp();
    return;
  }
  const filePath = argv[0];
  if (filePath === undefined || argv.length > 1) {
    console.error('Error: validate takes exactly one dialogs file');
    process.exitCode = 1;
    return;
  }
  try {
    const loaded = await loadDialogsFile(filePath);
    const evaluator = new DefaultExpressionEvaluator();
    loaded.dialogSet.validate(
      { evaluator, languageGenerator: new TemplateLanguageGenerator(evaluator) },
      loaded.rootDialogId,
    );
    console.log(
      `OK: ${loaded.definitions.length} dialog(s), root '${loaded.rootDialogId}'`,
    );
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}
