import { Command, Option } from "commander";

import { modelsCommand } from "./commands/models.js";
import { startCommand } from "./commands/start.js";
import { transcribeCommand } from "./commands/transcribe.js";
import { DEFAULT_SETTINGS_PATH } from "./config/configLoad.js";
import { initLogging } from "./log.js";
import { packageVersion } from "./packageVersion.js";

const program = new Command();

initLogging();

program
    .name("whisper-gateway")
    .description("HTTP gateway for a Whisper transcription backend")
    .version(packageVersion());

program
    .command("start")
    .description("Run the HTTP gateway")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(startCommand);

program
    .command("models")
    .description("List models known to the backend")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(modelsCommand);

program
    .command("transcribe")
    .description("Transcribe one audio file")
    .argument("<file>", "Audio file path")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("-m, --model <model>", "Model name (defaults to transcribe.defaultModel)")
    .option("-l, --language <language>", "Language hint; omit for auto-detection")
    .addOption(new Option("-t, --task <task>", "Task to run").choices(["transcribe", "translate"]))
    .option("--bytes", "Send the file contents instead of its path")
    .action(transcribeCommand);

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

await program.parseAsync(process.argv);
