#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command } from 'commander';
import { addCommand, type AddCommandOptions } from './commands/add.js';
import { listCommand, type ListCommandOptions } from './commands/list.js';
import { doneCommand, undoCommand } from './commands/done.js';
import { deleteCommand } from './commands/delete.js';
import { editCommand, type EditCommandOptions } from './commands/edit.js';
import { statsCommand, type StatsCommandOptions } from './commands/stats.js';
import { clearCommand } from './commands/clear.js';
import { initCommand, type InitCommandOptions } from './commands/init.js';
import { createServices, type GlobalOptions, type Services } from './services.js';
import { configService } from '../config/index.js';
import { formatTask } from '../formatters/task.js';

/**
 * Prints the error and exits with code 1.
 */
function fail(error: unknown): never {
  if (error instanceof Error) {
    console.error(error.message);
  } else {
    console.error('Неизвестная ошибка');
  }
  process.exit(1);
}

/**
 * Builds the CLI program. Every command opens the store through `createServices`,
 * using the global --config and --file options.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('todo')
    .description('Список задач с приоритетами, сроками и категориями')
    .version('1.0.0')
    .option('--config <path>', 'Путь к todo.config.yml')
    .option('--file <path>', 'Файл данных (переопределяет dataFile из конфигурации)');

  const withServices =
    <A extends unknown[]>(handler: (services: Services, ...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        const services = await createServices(program.opts<GlobalOptions>());
        await handler(services, ...args);
      } catch (error) {
        fail(error);
      }
    };

  program
    .command('add <title>')
    .description('Добавить задачу')
    .option('-p, --priority <priority>', 'Приоритет: high, medium, low')
    .option('-d, --due <date>', 'Срок (YYYY-MM-DD)')
    .option('-c, --category <category>', 'Категория')
    .action(
      withServices(
        async (services: Services, title: string, options: Omit<AddCommandOptions, 'title'>) => {
          const task = await addCommand({ ...options, title }, services);
          console.log(`✓ Задача добавлена: ${formatTask(task)}`);
        },
      ),
    );

  program
    .command('list')
    .description('Показать задачи')
    .option('-a, --all', 'Включая выполненные')
    .option('-c, --category <category>', 'Фильтр по категории')
    .option('-p, --priority <priority>', 'Фильтр по приоритету')
    .option('--json', 'Вывод в формате JSON')
    .action(
      withServices(async (services: Services, options: ListCommandOptions) => {
        await listCommand(options, services);
      }),
    );

  program
    .command('done <id>')
    .description('Отметить задачу выполненной')
    .action(
      withServices(async (services: Services, id: string) => {
        const doneId = await doneCommand({ id }, services);
        console.log(`✓ Задача ${doneId} выполнена`);
      }),
    );

  program
    .command('undo <id>')
    .description('Снять отметку выполнения')
    .action(
      withServices(async (services: Services, id: string) => {
        const undoneId = await undoCommand({ id }, services);
        console.log(`✓ Задача ${undoneId} снова в работе`);
      }),
    );

  program
    .command('delete <id>')
    .description('Удалить задачу')
    .action(
      withServices(async (services: Services, id: string) => {
        const deletedId = await deleteCommand({ id }, services);
        console.log(`✓ Задача ${deletedId} удалена`);
      }),
    );

  program
    .command('edit <id>')
    .description('Изменить задачу')
    .option('-t, --title <title>', 'Новое название')
    .option('-p, --priority <priority>', 'Новый приоритет')
    .option('-d, --due <date>', 'Новый срок (YYYY-MM-DD, пустая строка удаляет срок)')
    .option('-c, --category <category>', 'Новая категория')
    .action(
      withServices(
        async (services: Services, id: string, options: Omit<EditCommandOptions, 'id'>) => {
          const updatedId = await editCommand({ ...options, id }, services);
          console.log(`✓ Задача ${updatedId} обновлена`);
        },
      ),
    );

  program
    .command('stats')
    .description('Показать статистику')
    .option('--json', 'Вывод в формате JSON')
    .action(
      withServices(async (services: Services, options: StatsCommandOptions) => {
        await statsCommand(options, services);
      }),
    );

  program
    .command('clear')
    .description('Удалить выполненные задачи')
    .action(
      withServices(async (services: Services) => {
        const count = await clearCommand(services);
        console.log(`✓ Удалено выполненных задач: ${count}`);
      }),
    );

  program
    .command('init')
    .description('Создать todo.config.yml в текущей директории')
    .option('--data-file <path>', 'Путь к файлу данных', './todos.json')
    .action(async (options: { dataFile?: string }) => {
      try {
        const initOptions: InitCommandOptions = { file: options.dataFile };
        console.log(await initCommand(initOptions, configService));
      } catch (error) {
        fail(error);
      }
    });

  return program;
}

/**
 * Main CLI entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

// Run CLI if this file is executed directly (also through the npm bin symlink)
if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error('Критическая ошибка:', error);
    process.exit(1);
  });
}
