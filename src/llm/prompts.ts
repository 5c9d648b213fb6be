import type { LocalProjectContext } from "../context/project.js";
import type { CommandRecord, ExecutionContext } from "../types.js";

export function renderPromptTemplate(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{([a-zA-Z0-9_]+)\}\}/g, (_m, key: string) => {
    return variables[key] ?? "";
  });
}

const RUN_ROLE = `<role>
You are code-djinn, a {{osName}} shell command assistant using {{shell}}.
Turn the user's request into exactly one shell command.
</role>`;

const RUN_INSTRUCTIONS = `<instructions>
- Generate one concise command for the user's request
- Use proper {{shell}} syntax for {{osName}}
- Consider the working directory, localproject_context and shellhist_context
- When the user refers to "that file", "the error" or similar, use session_context
- Avoid full-screen programs (htop, top, vim, less, etc.); prefer text-output commands like ps, grep, cat
- Never wrap the command in markdown
- Reply with a JSON object only: {"command": "<shell command>", "explanation": "<one short sentence>"}
</instructions>`;

const ASK_ROLE = `<role>
You are code-djinn, a {{osName}} command-line assistant.
Answer questions about the previous command and its output. You do not run commands.
</role>`;

const ASK_INSTRUCTIONS = `<instructions>
- Base your answer on the previous command output in session_context
- If the context is insufficient, say so explicitly
- If asked about "the error" or "that file", reference session_context
- Respond in plain text suitable for a terminal
- Be concise but thorough
</instructions>`;

const NO_SESSION = `<session_context>
  <note>No previous command context available.</note>
</session_context>`;

function systemContextXml(context: ExecutionContext): string {
  return `<system_context>
  <os>${context.osName}</os>
  <shell>${context.shell}</shell>
  <cwd>${context.cwd}</cwd>
</system_context>`;
}

export function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function shellHistoryXml(commands: string[] | undefined): string {
  if (!commands || commands.length === 0) return "";
  const lines = commands.map((command, i) => `  <command index="${i + 1}">${escapeXml(command)}</command>`);
  return `<shellhist_context>\n${lines.join("\n")}\n</shellhist_context>`;
}

export function projectXml(project: LocalProjectContext | null | undefined): string {
  if (!project) return "";

  const parts: string[] = [];
  if (project.projectType) parts.push(`  <type>${project.projectType}</type>`);
  if (project.keyFiles.length > 0) parts.push(`  <key_files>${project.keyFiles.join(", ")}</key_files>`);
  if (project.virtualEnv) parts.push(`  <virtual_env>${escapeXml(project.virtualEnv)}</virtual_env>`);
  if (project.gitBranch || project.gitStatus) {
    parts.push("  <git_repo>");
    if (project.gitBranch) parts.push(`    <git_branch>${escapeXml(project.gitBranch)}</git_branch>`);
    if (project.gitStatus) parts.push(`    <git_status>${project.gitStatus}</git_status>`);
    parts.push("  </git_repo>");
  }
  if (project.makefileTargets.length > 0) {
    parts.push("  <makefile_commands>");
    for (const target of project.makefileTargets) {
      const text = target.description ? `${target.name}: ${target.description}` : target.name;
      parts.push(`    <cmd>${escapeXml(text)}</cmd>`);
    }
    parts.push("  </makefile_commands>");
  }

  if (parts.length === 0) return "";
  return `<localproject_context>\n${parts.join("\n")}\n</localproject_context>`;
}

function recordXml(tag: string, record: CommandRecord): string {
  return `<${tag}>
  <command>${record.command}</command>
  <exit_code>${record.exitCode}</exit_code>
  <output>
${record.output}
  </output>
</${tag}>`;
}

export function sessionContextXml(previous: CommandRecord | null, history: CommandRecord[]): string {
  if (!previous) return "";

  // History includes the current record as its last entry
  const earlier = history.filter((record) => record.timestamp !== previous.timestamp);
  const parts = [recordXml("previous_command", previous)];
  if (earlier.length > 0) {
    const lines = earlier.map((record) => `  <entry exit_code="${record.exitCode}">${record.command}</entry>`);
    parts.push(`<earlier_commands>\n${lines.join("\n")}\n</earlier_commands>`);
  }
  return `<session_context>\n${parts.join("\n")}\n</session_context>`;
}

export function buildRunSystemPrompt(
  context: ExecutionContext,
  previous: CommandRecord | null,
  history: CommandRecord[]
): string {
  const vars = { osName: context.osName, shell: context.shell };
  return [
    renderPromptTemplate(RUN_ROLE, vars),
    systemContextXml(context),
    shellHistoryXml(context.recentCommands),
    projectXml(context.project),
    sessionContextXml(previous, history),
    renderPromptTemplate(RUN_INSTRUCTIONS, vars),
  ]
    .filter(Boolean)
    .join("\n\n");
}

export function buildAskSystemPrompt(
  context: ExecutionContext,
  previous: CommandRecord | null,
  history: CommandRecord[]
): string {
  return [
    renderPromptTemplate(ASK_ROLE, { osName: context.osName }),
    systemContextXml(context),
    sessionContextXml(previous, history) || NO_SESSION,
    ASK_INSTRUCTIONS,
  ].join("\n\n");
}
