import {
  createPrompt,
  isDownKey,
  isEnterKey,
  isSpaceKey,
  isUpKey,
  useKeypress,
  useState,
} from '@inquirer/core';
import chalk from 'chalk';
import type { DependencyGraph } from '../core/graph.js';
import type { ComponentId, Registry } from '../types/registry.js';
import {
  createChecklist,
  isToggleAllKey,
  moveCursor,
  scrollTo,
  selectionOf,
  toggle,
  toggleAll,
  visibleRows,
  type ChecklistRow,
  type ChecklistState,
} from './checklist.js';

export interface SelectorConfig {
  message: string;
  registry: Registry;
  graph: DependencyGraph;
  preselected: ComponentId[];
  /** Rows available for items; defaults to the terminal height minus chrome. */
  pageSize?: number;
}

// message, position line, help line and the cursor line inquirer keeps free
const CHROME_ROWS = 4;

function fit(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, Math.max(0, width - 1))}…` : text;
}

function renderRow(row: ChecklistRow, registry: Registry, width: number): string {
  const component = registry.byId.get(row.id);
  const name = component?.name ?? row.id;
  const pointer = row.active ? chalk.cyan('❯') : ' ';
  const box = row.mark === 'explicit' ? chalk.green('[x]') : row.mark === 'auto' ? chalk.yellow('[+]') : '[ ]';

  const note =
    row.mark === 'auto'
      ? `required by ${row.requiredBy.map((id) => registry.byId.get(id)?.name ?? id).join(', ')}`
      : (component?.description ?? '');
  const label = row.active ? chalk.bold(name) : name;
  const room = width - name.length - 9;
  const detail = note && room > 3 ? `  ${chalk.dim(fit(note, room))}` : '';
  return `${pointer} ${box} ${label}${detail}`;
}

export const componentSelector = createPrompt<ComponentId[], SelectorConfig>((config, done) => {
  const { registry, graph } = config;
  const ids = registry.components.map((c) => c.id);
  const pageSize = config.pageSize ?? Math.max(1, (process.stdout.rows ?? 24) - CHROME_ROWS);
  const width = process.stdout.columns ?? 80;

  const [state, setState] = useState<ChecklistState>(createChecklist(config.preselected, ids));
  const [status, setStatus] = useState<'idle' | 'done'>('idle');
  const [notice, setNotice] = useState('');

  useKeypress((key) => {
    if (isEnterKey(key)) {
      setStatus('done');
      done(selectionOf(state, ids));
      return;
    }
    setNotice('');

    if (isUpKey(key)) {
      setState(moveCursor(state, -1, ids.length, pageSize));
    } else if (isDownKey(key)) {
      setState(moveCursor(state, 1, ids.length, pageSize));
    } else if (key.name === 'pageup') {
      setState(moveCursor(state, -pageSize, ids.length, pageSize));
    } else if (key.name === 'pagedown') {
      setState(moveCursor(state, pageSize, ids.length, pageSize));
    } else if (key.name === 'home') {
      setState(scrollTo(state, 0, ids.length, pageSize));
    } else if (key.name === 'end') {
      setState(scrollTo(state, ids.length - 1, ids.length, pageSize));
    } else if (isSpaceKey(key) && ids.length > 0) {
      const id = ids[state.cursor];
      const next = toggle(state, id, graph);
      if (next === state) {
        const owners = graph.requiredBy(id, state.explicit).map((o) => registry.byId.get(o)?.name ?? o);
        setNotice(`${registry.byId.get(id)?.name ?? id} is required by ${owners.join(', ')}`);
      } else {
        setState(next);
      }
    } else if (isToggleAllKey(key)) {
      setState(toggleAll(state, ids));
    }
  });

  if (status === 'done') {
    const chosen = selectionOf(state, ids).map((id) => registry.byId.get(id)?.name ?? id);
    return `${chalk.green('✔')} ${config.message} ${chalk.cyan(chosen.join(', ') || '(none)')}`;
  }

  if (ids.length === 0) {
    return `${chalk.yellow('?')} ${config.message}\n${chalk.dim('No components in registry. Press enter.')}`;
  }

  const rows = visibleRows(state, ids, graph, pageSize);
  const first = rows[0]?.index ?? 0;
  const last = rows[rows.length - 1]?.index ?? 0;
  const position =
    ids.length > pageSize ? chalk.dim(`  (${first + 1}-${last + 1} of ${ids.length})`) : '';
  const help = notice
    ? chalk.yellow(notice)
    : chalk.dim('↑/↓ move · space toggle · a all · enter confirm');

  return [
    `${chalk.green('?')} ${chalk.bold(config.message)}${position}`,
    ...rows.map((row) => renderRow(row, registry, width)),
    help,
  ].join('\n');
});
