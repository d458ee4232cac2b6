/**
 * solbench completion command
 *
 * Prints a completion script generated from the commander tree, so it
 * never drifts from the registered commands and options.
 *
 *   eval "$(solbench completion bash)"
 *   solbench completion fish > ~/.config/fish/completions/solbench.fish
 */

import type { Command } from 'commander';

export const COMPLETION_SHELLS = ['bash', 'fish'] as const;

export type CompletionShell = (typeof COMPLETION_SHELLS)[number];

interface CompletionNode {
  /** Subcommand words leading to this command, e.g. ["test", "transfer"] */
  path: string[];
  subcommands: string[];
  options: Array<{ long: string; short?: string }>;
}

function collectNodes(command: Command, path: string[] = []): CompletionNode[] {
  const options = command.options.flatMap((option) =>
    option.long ? [{ long: option.long, short: option.short }] : []
  );
  const node: CompletionNode = {
    path,
    subcommands: command.commands.map((sub) => sub.name()),
    options,
  };
  return [node, ...command.commands.flatMap((sub) => collectNodes(sub, [...path, sub.name()]))];
}

function bashScript(name: string, nodes: CompletionNode[]): string {
  const fn = `_${name.replace(/[^A-Za-z0-9_]/g, '_')}`;
  const cases = nodes.map((node) => {
    const words = [...node.subcommands, ...node.options.map((option) => option.long), '--help'];
    return `    "${node.path.join(' ')}") COMPREPLY=($(compgen -W "${words.join(' ')}" -- "$cur")) ;;`;
  });
  return [
    `# ${name} bash completion`,
    `${fn}() {`,
    '  local cur="${COMP_WORDS[COMP_CWORD]}"',
    '  local path=""',
    '  local i',
    '  for ((i = 1; i < COMP_CWORD; i++)); do',
    '    case "${COMP_WORDS[i]}" in',
    '      -*) ;;',
    '      *) path="${path:+$path }${COMP_WORDS[i]}" ;;',
    '    esac',
    '  done',
    '  case "$path" in',
    ...cases,
    '    *) COMPREPLY=() ;;',
    '  esac',
    '}',
    `complete -o default -F ${fn} ${name}`,
    '',
  ].join('\n');
}

function fishScript(name: string, nodes: CompletionNode[]): string {
  const lines = [`# ${name} fish completion`];
  for (const node of nodes) {
    const last = node.path[node.path.length - 1];
    const condition =
      last === undefined ? '__fish_use_subcommand' : `__fish_seen_subcommand_from ${last}`;
    if (node.subcommands.length > 0) {
      lines.push(`complete -c ${name} -n '${condition}' -a '${node.subcommands.join(' ')}'`);
    }
    for (const option of node.options) {
      const short = option.short ? ` -s ${option.short.replace(/^-/, '')}` : '';
      lines.push(`complete -c ${name} -n '${condition}' -l ${option.long.replace(/^--/, '')}${short}`);
    }
  }
  lines.push('');
  return lines.join('\n');
}

export function completionScript(program: Command, shell: CompletionShell): string {
  const nodes = collectNodes(program);
  return shell === 'bash' ? bashScript(program.name(), nodes) : fishScript(program.name(), nodes);
}

export function completionCommand(program: Command, shell: CompletionShell): void {
  process.stdout.write(completionScript(program, shell));
}
