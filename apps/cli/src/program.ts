import path from "node:path";
import { parseArgs } from "node:util";
import {
  OPERATIONS,
  assertCanModify,
  availableOperations,
  isCutlineError,
  parseTranscript,
  readJSON,
  writeJSON,
  type Transcript,
} from "@cutline/core";
import { loadConfig, type CutlineConfig } from "./config";
import { addSubtitlesToProject, type SubtitleStyle } from "./tools/add-subtitles";
import { analyze, formatAnalysisSummary } from "./tools/analyze";
import {
  formatProjectList,
  formatProjectSummary,
  listDraftProjects,
  openProject,
  resolveProjectDir,
} from "./tools/projects";
import { formatSmartCutResult, smartCutProject } from "./tools/smart-cut-project";
import { generateSubtitles, placementsFromPlan, writeSrt } from "./tools/subtitles";
import { getOutputPaths, transcribe } from "./tools/transcribe";

const USAGE: Record<string, string> = {
  projects: "cutline projects [--all]",
  open: "cutline open <project folder or name>",
  transcribe: "cutline transcribe <media file> [--language xx] [--force]",
  analyze: "cutline analyze <media file | transcript.json> [--no-duplicates]",
  subtitles: "cutline subtitles <media file | transcript.json> [--output file.srt] [--accents]",
  "smart-cut":
    "cutline smart-cut <project> [--in-place [--no-backup]] [--name NAME] [--subtitles] [--no-duplicates]",
  "add-subtitles":
    "cutline add-subtitles <project> [--srt file.srt | --transcript file.json] [--style dynamic|simple] [--in-place]",
};

const parseCommandLine = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      all: { type: "boolean" },
      language: { type: "string" },
      force: { type: "boolean" },
      "no-duplicates": { type: "boolean" },
      threshold: { type: "string" },
      output: { type: "string" },
      accents: { type: "boolean" },
      "in-place": { type: "boolean" },
      "no-backup": { type: "boolean" },
      name: { type: "string" },
      subtitles: { type: "boolean" },
      srt: { type: "string" },
      transcript: { type: "string" },
      style: { type: "string" },
      "out-dir": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

type CommandLine = ReturnType<typeof parseCommandLine>;

export const formatHelp = (config: CutlineConfig): string => {
  const operations = availableOperations(config.capabilities);
  const width = Math.max(...operations.map((operation) => operation.name.length));
  return [
    "Usage: cutline <command> [options]",
    "",
    "Commands:",
    ...operations.map(
      (operation) => `  ${operation.name.padEnd(width)}  ${operation.description}`
    ),
    "",
    "Transcripts and cut plans are cached under ./output (change with --out-dir).",
    `Allowed targets: ${config.capabilities.allowedTargets} (CUTLINE_ALLOWED_TARGETS)`,
  ].join("\n");
};

const requirePositional = (commandLine: CommandLine, command: string): string => {
  const value = commandLine.positionals[1];
  if (!value) {
    throw new Error(`Missing argument. Usage: ${USAGE[command] ?? command}`);
  }
  return value;
};

const loadOrTranscribe = async (
  input: string,
  config: CutlineConfig,
  commandLine: CommandLine
): Promise<{ transcript: Transcript; paths: ReturnType<typeof getOutputPaths> }> => {
  const paths = getOutputPaths(input, commandLine.values["out-dir"]);
  if (path.extname(input).toLowerCase() === ".json") {
    return { transcript: parseTranscript(await readJSON(input)), paths };
  }
  const transcript = await transcribe(input, paths.transcriptFile, {
    force: commandLine.values.force,
    language: commandLine.values.language,
    config: config.ai,
  });
  return { transcript, paths };
};

const silenceThreshold = (commandLine: CommandLine, config: CutlineConfig): number => {
  const raw = commandLine.values.threshold;
  if (raw === undefined) {
    return config.silenceThresholdSec;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`--threshold must be a non-negative number of seconds, got "${raw}"`);
  }
  return value;
};

const parseStyle = (raw: string | undefined): SubtitleStyle => {
  if (raw === undefined || raw === "dynamic" || raw === "simple") {
    return raw ?? "dynamic";
  }
  throw new Error(`--style must be "dynamic" or "simple", got "${raw}"`);
};

const runCommand = async (
  command: string,
  commandLine: CommandLine,
  config: CutlineConfig
): Promise<void> => {
  const { values } = commandLine;

  // Mutating commands the gate does not allow fail before any work
  const operation = OPERATIONS.find((candidate) => candidate.name === command);
  if (operation?.requires) {
    assertCanModify(config.capabilities, operation.requires, command);
  }

  switch (command) {
    case "projects": {
      const { draftsDir, projects } = await listDraftProjects(config.draftsDir, values.all);
      if (!draftsDir) {
        console.log("No drafts folder found; set CUTLINE_DRAFTS_DIR.");
        return;
      }
      console.log(`Projects in ${draftsDir}:\n${formatProjectList(projects)}`);
      return;
    }
    case "open": {
      const projectDir = await resolveProjectDir(
        requirePositional(commandLine, command),
        config.draftsDir
      );
      console.log(formatProjectSummary(await openProject(projectDir)));
      return;
    }
    case "transcribe": {
      const input = requirePositional(commandLine, command);
      const { transcriptFile } = getOutputPaths(input, values["out-dir"]);
      const transcript = await transcribe(input, transcriptFile, {
        force: values.force,
        language: values.language,
        config: config.ai,
      });
      console.log(
        `Transcribed ${transcript.segments.length} segments (${transcript.language ?? "unknown language"}) to ${transcriptFile}`
      );
      return;
    }
    case "analyze": {
      const input = requirePositional(commandLine, command);
      const { transcript, paths } = await loadOrTranscribe(input, config, commandLine);
      const result = await analyze(transcript, {
        silenceThresholdSec: silenceThreshold(commandLine, config),
        minSegmentDurationSec: config.minSegmentDurationSec,
        detectDuplicates: !values["no-duplicates"],
        config: config.ai,
      });
      await writeJSON(paths.cutPlanFile, result.plan);
      console.log(`${formatAnalysisSummary(result.summary)}\n\nCut plan saved to ${paths.cutPlanFile}`);
      return;
    }
    case "subtitles": {
      const input = requirePositional(commandLine, command);
      const { transcript, paths } = await loadOrTranscribe(input, config, commandLine);
      const { plan } = await analyze(transcript, {
        silenceThresholdSec: silenceThreshold(commandLine, config),
        minSegmentDurationSec: config.minSegmentDurationSec,
        detectDuplicates: !values["no-duplicates"],
        config: config.ai,
      });
      const lines = await generateSubtitles(transcript, placementsFromPlan(plan), {
        maxWords: config.subtitleMaxWords,
        maxChars: config.subtitleMaxChars,
        accents: values.accents ?? false,
        config: config.ai,
      });
      const output = values.output ?? paths.srtFile;
      await writeSrt(output, lines);
      console.log(`Wrote ${lines.length} subtitle lines to ${output}`);
      return;
    }
    case "smart-cut": {
      const projectDir = await resolveProjectDir(
        requirePositional(commandLine, command),
        config.draftsDir
      );
      const result = await smartCutProject(projectDir, {
        config,
        inPlace: values["in-place"],
        backup: !values["no-backup"],
        name: values.name,
        language: values.language,
        detectDuplicates: !values["no-duplicates"],
        addSubtitles: values.subtitles,
        outputRoot: values["out-dir"],
      });
      console.log(formatSmartCutResult(result));
      return;
    }
    case "add-subtitles": {
      const projectDir = await resolveProjectDir(
        requirePositional(commandLine, command),
        config.draftsDir
      );
      const result = await addSubtitlesToProject(projectDir, {
        config,
        srtPath: values.srt,
        transcriptPath: values.transcript,
        style: parseStyle(values.style),
        inPlace: values["in-place"],
        backup: !values["no-backup"],
        name: values.name,
        language: values.language,
        outputRoot: values["out-dir"],
      });
      console.log(`Added ${result.subtitlesAdded} subtitles. Saved to ${result.saved.path}`);
      return;
    }
    default:
      throw new Error(`Unknown command "${command}". Run "cutline help" for the list of commands.`);
  }
};

/**
 * Runs one CLI invocation and returns the process exit code.
 */
export const runCli = async (
  argv: string[],
  env: Record<string, string | undefined> = process.env
): Promise<number> => {
  try {
    const config = loadConfig(env);
    const commandLine = parseCommandLine(argv);
    const command = commandLine.positionals[0] ?? "help";

    if (command === "help" || commandLine.values.help) {
      console.log(formatHelp(config));
      return 0;
    }

    await runCommand(command, commandLine, config);
    return 0;
  } catch (error) {
    if (isCutlineError(error)) {
      console.error(`Error [${error.code}]: ${error.message}`);
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 1;
  }
};
