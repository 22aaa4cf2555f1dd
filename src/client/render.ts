import { CONVERSION_DIRECTIONS, type ConversionDirection, getExtension } from '../config/formats';
import { formatFileSize } from './format';
import type { ConvertedFile, ConverterState, QueuedFile } from './types';

export interface ConverterElements {
  directionButtons: HTMLButtonElement[];
  fileInput: HTMLInputElement;
  hint: HTMLElement;
  queueSection: HTMLElement;
  queueList: HTMLElement;
  convertButton: HTMLButtonElement;
  failuresList: HTMLElement;
  convertedSection: HTMLElement;
  convertedList: HTMLElement;
  downloadAllButton: HTMLButtonElement;
}

export interface RenderActions {
  onRemove(id: string): void;
  onDownload(file: ConvertedFile): void;
}

const DIRECTION_ICONS: Record<ConversionDirection, string> = {
  'docx-to-pdf': '📄',
  'pdf-to-docx': '📑'
};

function element<K extends keyof HTMLElementTagNameMap>(tag: K, className: string, text?: string): HTMLElementTagNameMap[K] {
  const node = document.createElement(tag);
  node.className = className;
  if (text !== undefined) {
    node.textContent = text;
  }
  return node;
}

function progressLabel(progress: number): string {
  return `Converting... ${Math.round(progress)}%`;
}

function createActionButton(label: string, className: string, onClick: () => void): HTMLButtonElement {
  const button = element('button', `btn btn-sm ${className}`, label);
  button.type = 'button';
  button.addEventListener('click', onClick);
  return button;
}

function createFileItem(id: string, name: string, size: number, icon: string): HTMLDivElement {
  const item = element('div', 'file-item');
  item.dataset.fileId = id;

  const info = element('div', 'file-info');
  info.append(element('div', 'file-name', name), element('div', 'file-size', formatFileSize(size)));
  item.append(element('div', 'file-icon', icon), info);

  return item;
}

function createQueueItem(item: QueuedFile, direction: ConversionDirection, actions: RenderActions, locked: boolean): HTMLDivElement {
  const node = createFileItem(item.id, item.name, item.size, DIRECTION_ICONS[direction]);
  node.dataset.status = item.status;
  const info = node.querySelector('.file-info');

  if (item.status === 'processing' && info) {
    const progress = item.progress ?? 0;
    const bar = element('div', 'progress-bar');
    const fill = element('div', 'progress-fill');
    fill.style.width = `${Math.round(progress)}%`;
    bar.append(fill);

    const container = element('div', 'progress-container');
    container.append(bar, element('div', 'progress-text', progressLabel(progress)));
    info.append(container);
  } else if (item.status === 'error' && info) {
    info.append(element('div', 'file-error', item.error ?? 'Conversion failed'));
  } else if (item.status === 'completed' && info) {
    info.append(element('div', 'file-done', 'Converted'));
  }

  if (!locked) {
    const actionsNode = element('div', 'file-actions');
    actionsNode.append(createActionButton('Remove', 'btn-danger', () => actions.onRemove(item.id)));
    node.append(actionsNode);
  }

  return node;
}

export function renderDirection(state: ConverterState, elements: ConverterElements): void {
  const { source } = CONVERSION_DIRECTIONS[state.direction];

  for (const button of elements.directionButtons) {
    button.classList.toggle('active', button.dataset.direction === state.direction);
    button.disabled = state.converting;
  }

  elements.fileInput.accept = `.${source}`;
  elements.hint.textContent = `Supported format: .${source}`;
}

export function renderQueue(state: ConverterState, elements: ConverterElements, actions: RenderActions): void {
  elements.queueSection.hidden = state.queue.length === 0;
  elements.queueList.replaceChildren(
    ...state.queue.map((item) => createQueueItem(item, state.direction, actions, state.converting))
  );

  elements.convertButton.disabled = state.converting || state.queue.length === 0;
  elements.convertButton.textContent = state.converting ? '⏳ Converting...' : 'Convert All';
}

/** Updates one item's bar in place instead of rebuilding the list. */
export function renderProgress(item: QueuedFile, elements: ConverterElements): void {
  const node = Array.from(elements.queueList.querySelectorAll<HTMLElement>('.file-item'))
    .find((candidate) => candidate.dataset.fileId === item.id);
  if (!node) {
    return;
  }

  const progress = item.progress ?? 0;
  const fill = node.querySelector<HTMLElement>('.progress-fill');
  const text = node.querySelector('.progress-text');

  if (fill) {
    fill.style.width = `${Math.round(progress)}%`;
  }
  if (text) {
    text.textContent = progressLabel(progress);
  }
}

export function renderFailures(state: ConverterState, elements: ConverterElements): void {
  elements.failuresList.hidden = state.failures.length === 0;
  elements.failuresList.replaceChildren(
    ...state.failures.map((failure) => element('li', 'failure', `Error converting ${failure.name}: ${failure.message}`))
  );
}

export function renderConverted(state: ConverterState, elements: ConverterElements, actions: RenderActions): void {
  elements.convertedSection.hidden = state.converted.length === 0;
  elements.downloadAllButton.disabled = state.converted.length === 0;

  elements.convertedList.replaceChildren(
    ...state.converted.map((file) => {
      // The converted list outlives direction switches, so the icon follows the file.
      const icon = getExtension(file.name) === 'pdf' ? DIRECTION_ICONS['docx-to-pdf'] : DIRECTION_ICONS['pdf-to-docx'];
      const node = createFileItem(file.id, file.name, file.size, icon);
      const actionsNode = element('div', 'file-actions');
      actionsNode.append(createActionButton('Download', 'btn-success', () => actions.onDownload(file)));
      node.append(actionsNode);
      return node;
    })
  );
}

export function renderAll(state: ConverterState, elements: ConverterElements, actions: RenderActions): void {
  renderDirection(state, elements);
  renderQueue(state, elements, actions);
  renderFailures(state, elements);
  renderConverted(state, elements, actions);
}
