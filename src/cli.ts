#!/usr/bin/env node
import dotenv from 'dotenv';
import { DEFAULT_CONFIG_PATH, loadSettings } from './config/settings.js';
import { disconnectDB } from './config/database.js';
import { ChapterController } from './controllers/chapterController.js';
import { ExportController } from './controllers/exportController.js';
import { MemoryController } from './controllers/memoryController.js';
import { ProjectController } from './controllers/projectController.js';
import { SceneController } from './controllers/sceneController.js';
import { ServiceContainer, createServices } from './services/index.js';
import { OptionSpec, ParsedArgs, getOption, getOptionList, parseArgs, parsePositiveInt } from './utils/argParser.js';
import { InputError, handleError } from './utils/errorHandler.js';
import { LogLevel, logger, parseLogLevel } from './utils/logger.js';

dotenv.config();

const OPTIONS: OptionSpec = {
    valued: {
        '-c': 'config', '--config': 'config',
        '-i': 'input', '--input': 'input',
        '-p': 'passes', '--passes': 'passes',
        '-t': 'title', '--title': 'title',
        '-a': 'author', '--author': 'author',
        '-f': 'format', '--format': 'format'
    },
    flags: {
        '-v': 'verbose', '--verbose': 'verbose',
        '-h': 'help', '--help': 'help',
        '--no-smooth': 'noSmooth'
    }
};

const USAGE = `Usage: scenewright [-c config.json] [-v] <command> [args]

Commands:
  init <book>                                  create the book layout and copy prompts
  memory-init <book>                           load the story bible into memory
  note <book> <category> <text>                add a continuity note
  generate <book> <chapter> <scene> <outline>  write a raw scene from its outline
  refine <book> <chapter> <scene> -i <file> [--passes cohesion,style,polish]
  assemble <book> <chapter> [--no-smooth]      join final scenes into a chapter
  export <book> [--title T] [--author A] [--format epub|pdf|docx|html|all]
  check-models                                 list configured models on the server
  status                                       project, memory and book status
  info                                         workflow overview`;

type Command = (services: ServiceContainer, args: ParsedArgs) => Promise<unknown>;

/** Positional arguments after the command name, checked for count. */
function operands(args: ParsedArgs, names: string[]): string[] {
    const values = args.positionals.slice(1);
    if (values.length !== names.length) {
        throw new InputError(`Expected ${names.map(n => `<${n}>`).join(' ')}\n\n${USAGE}`);
    }
    return values;
}

export const COMMANDS: Record<string, Command> = {
    'init': (services, args) => {
        const [book] = operands(args, ['book']);
        return new ProjectController(services).init(book);
    },
    'memory-init': (services, args) => {
        const [book] = operands(args, ['book']);
        return new MemoryController(services).memoryInit(book);
    },
    'note': (services, args) => {
        const [book, category, text] = operands(args, ['book', 'category', 'text']);
        return new MemoryController(services).note(book, category, text);
    },
    'generate': (services, args) => {
        const [book, chapter, scene, outline] = operands(args, ['book', 'chapter', 'scene', 'outline_path']);
        return new SceneController(services).generate(
            book,
            parsePositiveInt(chapter, 'chapter'),
            parsePositiveInt(scene, 'scene'),
            outline
        );
    },
    'refine': (services, args) => {
        const [book, chapter, scene] = operands(args, ['book', 'chapter', 'scene']);
        const input = getOption(args, 'input');
        if (!input) throw new InputError('refine requires -i <input_path>');
        return new SceneController(services).refine(
            book,
            parsePositiveInt(chapter, 'chapter'),
            parsePositiveInt(scene, 'scene'),
            input,
            getOptionList(args, 'passes')
        );
    },
    'assemble': (services, args) => {
        const [book, chapter] = operands(args, ['book', 'chapter']);
        return new ChapterController(services).assemble(book, parsePositiveInt(chapter, 'chapter'), !args.flags.has('noSmooth'));
    },
    'export': (services, args) => {
        const [book] = operands(args, ['book']);
        return new ExportController(services).exportBook(book, {
            title: getOption(args, 'title'),
            author: getOption(args, 'author'),
            formats: getOptionList(args, 'format')
        });
    },
    'check-models': services => new ProjectController(services).checkModels(),
    'status': services => new ProjectController(services).status(),
    'info': services => new ProjectController(services).info()
};

export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
    let verbose = argv.includes('-v') || argv.includes('--verbose');

    try {
        const args = parseArgs(argv, OPTIONS);
        verbose = args.flags.has('verbose');

        if (args.flags.has('help')) {
            console.log(USAGE);
            return 0;
        }
        const name = args.positionals[0];
        if (!name) {
            console.log(USAGE);
            return 2;
        }
        const command = COMMANDS[name];
        if (!command) {
            throw new InputError(`Unknown command: ${name}\n\n${USAGE}`);
        }

        const settings = loadSettings(getOption(args, 'config') ?? env.SCENEWRIGHT_CONFIG ?? DEFAULT_CONFIG_PATH, env);
        logger.setLevel(verbose ? LogLevel.DEBUG : parseLogLevel(settings.logging.level));

        await command(createServices(settings), args);
        return 0;
    } catch (error) {
        return handleError(error, verbose);
    } finally {
        await disconnectDB();
    }
}

if (require.main === module) {
    main(process.argv.slice(2))
        .then(code => {
            process.exitCode = code;
        })
        .catch(error => {
            process.exitCode = handleError(error);
        });
}
