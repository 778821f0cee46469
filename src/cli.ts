import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import {
    checkDiskSpace,
    DicomSynthError,
    formatBytes,
    generateSeries,
    inspectDirectory,
    InvalidOptionsError,
    parseSize,
    resolveGeneratorOptions,
    type GenerationReporter,
    type GeneratorOptionsInput,
} from "./index";

export interface GenerateCommand {
    options: GeneratorOptionsInput;
    quiet: boolean;
}

function takeValue(args: string[], index: number, flag: string): string {
    const value = args[index + 1];
    if (value === undefined || value.startsWith("--")) {
        throw new InvalidOptionsError(`Missing value for ${flag}`, [`${flag}: missing value`]);
    }
    return value;
}

/**
 * Parse `generate` arguments. Flags win over the positional
 * `<frames> <size> <output>` form.
 */
export function parseGenerateArgs(args: string[]): GenerateCommand {
    let frames: string | undefined;
    let size: string | undefined;
    let output: string | undefined;
    let seed: string | undefined;
    let dicomdir = true;
    let quiet = false;
    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case "--frames":
            case "-n":
                frames = takeValue(args, i++, arg);
                break;
            case "--size":
            case "-s":
                size = takeValue(args, i++, arg);
                break;
            case "--output":
            case "-o":
                output = takeValue(args, i++, arg);
                break;
            case "--seed":
                seed = takeValue(args, i++, arg);
                break;
            case "--no-dicomdir":
                dicomdir = false;
                break;
            case "--quiet":
            case "-q":
                quiet = true;
                break;
            default:
                if (arg.startsWith("-")) {
                    throw new InvalidOptionsError(`Unknown option: ${arg}`, [`${arg}: unknown option`]);
                }
                positional.push(arg);
        }
    }

    frames ??= positional[0];
    size ??= positional[1];
    output ??= positional[2];
    if (frames === undefined || size === undefined || output === undefined) {
        throw new InvalidOptionsError(
            "Usage: mri-dicom-synth generate --frames <n> --size <size> --output <dir>",
            ["frames, size and output are required"],
        );
    }

    return {
        options: {
            frameCount: Number(frames),
            totalSize: size,
            outputDir: output,
            seed: seed === undefined ? undefined : Number(seed),
            dicomdir,
        },
        quiet,
    };
}

export function createConsoleReporter(quiet: boolean): GenerationReporter {
    const progress = (message: string) => {
        if (!quiet) console.log(message);
    };

    return {
        onPlan: (plan) => {
            const { width, height } = plan.geometry;
            progress(`Generating ${plan.frameCount} MR images of ${width}x${height} (target ${formatBytes(plan.targetBytes)})`);
            progress(`Output: ${plan.outputDir}`);
            progress(`Seed: ${plan.seed}`);
        },
        onClamp: (dimensions) => {
            console.warn(
                `Warning: pixel budget capped at ${formatBytes(dimensions.availableBytes)} to fit the 32-bit length field`,
            );
        },
        onFileWritten: (file, total) => {
            progress(`  [${file.instanceNumber}/${total}] ${file.fileName} (${formatBytes(file.byteLength)})`);
        },
        onIndexWritten: (index) => {
            progress(`DICOMDIR written with ${index.recordCount} records`);
        },
        onIndexFailed: (error) => {
            console.warn(`Warning: ${error.message}. Instance files were kept.`);
        },
        onComplete: (result) => {
            progress(`Done: ${result.files.length} files, ${formatBytes(result.totalBytes)}`);
        },
    };
}

function generate(args: string[]): number {
    const command = parseGenerateArgs(args);
    const options = resolveGeneratorOptions(command.options);
    checkDiskSpace(path.resolve(options.outputDir), parseSize(options.totalSize));
    generateSeries(options, createConsoleReporter(command.quiet));
    return 0;
}

function inspect(dir: string): number {
    if (!fs.existsSync(dir)) {
        console.error(`Error: directory '${dir}' does not exist`);
        return 1;
    }
    const { warnings, ...report } = inspectDirectory(dir);
    for (const warning of warnings) {
        console.warn(`Warning: ${warning}`);
    }
    console.log(JSON.stringify(report, null, 2));
    return report.file_count > 0 ? 0 : 1;
}

function printHelp() {
    console.log(`
mri-dicom-synth CLI v1.0.0

Commands:
  generate --frames <n> --size <size> --output <dir> [--seed <int>] [--no-dicomdir] [--quiet]
  generate <frames> <size> <dir>
                               Write a synthetic MR series of <n> frames totalling about <size>
                               (e.g. 100MB, 4.5GB) plus a DICOMDIR index.
  inspect <dir>                Print a JSON summary of every instance file in <dir>.
  help                         Show this message.
    `);
}

/**
 * Run a command and return its exit code
 */
export function run(args: string[] = process.argv.slice(2)): number {
    const command: string | undefined = args[0];
    try {
        switch (command) {
            case "generate":
                return generate(args.slice(1));

            case "inspect":
                if (!args[1]) {
                    console.error("Usage: mri-dicom-synth inspect <dir>");
                    return 1;
                }
                return inspect(args[1]);

            case "help":
            case "--help":
            case "-h":
                printHelp();
                return 0;

            case undefined:
                printHelp();
                return 1;

            default:
                console.error(`Unknown command: ${command}`);
                printHelp();
                return 1;
        }
    } catch (error) {
        if (error instanceof DicomSynthError) {
            console.error(`Error: ${error.message}`);
            return 1;
        }
        throw error;
    }
}

// ESM check
if (import.meta.url && process.argv[1] === fileURLToPath(import.meta.url)) {
    try {
        process.exitCode = run();
    } catch (err) {
        console.error(err);
        process.exitCode = 1;
    }
}
