import { Command } from 'commander';
import { CsvTransform } from '../api/transformer';

export interface ApplyCommandOptions {
  template: string[];
  output?: string;
}

export function createCsvshiftProgram(): Command {
  const program = new Command();

  program
    .name('csvshift')
    .description('Derive CSV columns from a YAML transform template');

  program
    .command('apply')
    .description('Apply one or more templates to a CSV file; each further template cascades on the previous output')
    .argument('<input>', 'Input CSV file with a header line')
    .requiredOption('-t, --template <paths...>', 'Transform template(s), applied in order')
    .option('-o, --output <path>', 'Write the result here instead of stdout')
    .action((input: string, options: ApplyCommandOptions) => {
      const transform = new CsvTransform();
      transform.loadData(input);
      options.template.forEach((template, i) => transform.apply(template, { cascade: i > 0 }));

      if (options.output) {
        transform.saveData(options.output);
        console.log(options.output);
      } else {
        process.stdout.write(transform.output());
      }
    });

  return program;
}

export async function runCsvshiftCli(argv: string[]): Promise<void> {
  await createCsvshiftProgram().parseAsync(argv);
}
