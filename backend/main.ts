import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { COMMANDS, usage } from './cli/commands';
import { getString, parseArgs } from './cli/args';
import { ConfigService } from './core/services/ConfigService';
import { ExifToolReader } from './infrastructure/ExifToolReader';
import { probeFile } from './infrastructure/FileProbe';
import { SidecarAnalysisProvider } from './infrastructure/SidecarAnalysisProvider';
import { PhotoMetadataStore } from './MetadataStore';
import logger, { configureLogger } from './logger';

export async function run(argv: string[]): Promise<number> {
    const args = parseArgs(argv);
    const command = args.command ? COMMANDS[args.command] : undefined;

    if (!command) {
        if (args.command) {
            console.error(`Error: Unknown command '${args.command}'`);
        } else if (args.options.size > 0) {
            console.error('Error: Missing command');
        }
        console.log(usage());
        return args.command || args.options.size > 0 ? 1 : 0;
    }

    const exif = new ExifToolReader();
    let store: PhotoMetadataStore | null = null;
    try {
        const loaded = ConfigService.load(getString(args, 'config'));
        const dbPath = getString(args, 'db');
        const config = dbPath ? { ...loaded, database: { ...loaded.database, path: dbPath } } : loaded;
        configureLogger({ level: config.logging.level, dir: config.logging.dir });
        logger.debug(`[Main] Running '${args.command}' against ${config.database.path}`);

        store = PhotoMetadataStore.open(config);
        await command.run({
            store,
            analysis: new SidecarAnalysisProvider(),
            exif,
            probe: probeFile,
            extensions: config.analysis.supportedExtensions,
            out: line => console.log(line)
        }, args);
        return 0;
    } catch (e) {
        logger.debug('[Main] Command failed:', e);
        console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
        return 1;
    } finally {
        store?.close();
        await exif.end();
    }
}

const isEntryPoint = process.argv[1] !== undefined
    && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntryPoint) {
    run(process.argv.slice(2))
        .then(code => { process.exitCode = code; })
        .catch((e: unknown) => {
            console.error(`Error: ${String(e)}`);
            process.exitCode = 1;
        });
}
