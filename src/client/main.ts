import { CONVERSION_DIRECTIONS, isConversionDirection } from '../config/formats';
import { HttpConverterApi } from './api';
import { convertAll } from './batch';
import { type ConverterElements, type RenderActions, renderAll, renderDirection, renderProgress, renderQueue } from './render';
import { addFiles, createConverterState, removeFile, setDirection } from './state';
import type { ConvertedFile } from './types';

function requireElement<T extends HTMLElement>(id: string, type: new () => T): T {
  const node = document.getElementById(id);
  if (!(node instanceof type)) {
    throw new Error(`Missing #${id} element.`);
  }
  return node;
}

function collectElements(): ConverterElements {
  return {
    directionButtons: Array.from(document.querySelectorAll<HTMLButtonElement>('.toggle-btn')),
    fileInput: requireElement('file-input', HTMLInputElement),
    hint: requireElement('file-type-hint', HTMLElement),
    queueSection: requireElement('file-queue-section', HTMLElement),
    queueList: requireElement('file-queue', HTMLElement),
    convertButton: requireElement('convert-all-btn', HTMLButtonElement),
    failuresList: requireElement('conversion-errors', HTMLElement),
    convertedSection: requireElement('converted-files-section', HTMLElement),
    convertedList: requireElement('converted-files', HTMLElement),
    downloadAllButton: requireElement('download-all-btn', HTMLButtonElement)
  };
}

// A form post lets the browser honour the attachment disposition of the archive.
function submitBulkDownload(action: string, fileIds: string[]): void {
  const form = document.createElement('form');
  form.method = 'POST';
  form.action = action;
  form.hidden = true;

  const input = document.createElement('input');
  input.type = 'hidden';
  input.name = 'file_ids';
  input.value = JSON.stringify(fileIds);
  form.append(input);

  document.body.append(form);
  form.submit();
  form.remove();
}

function start(): void {
  const elements = collectElements();
  const api = new HttpConverterApi(document.body.dataset.apiBase ?? '');
  const state = createConverterState();

  const actions: RenderActions = {
    onRemove: (id: string) => {
      if (removeFile(state, id)) {
        renderQueue(state, elements, actions);
      }
    },
    onDownload: (file: ConvertedFile) => {
      window.location.href = api.downloadUrl(file.fileId);
    }
  };

  const queueFiles = (files: File[]): void => {
    const { added } = addFiles(state, files);
    if (added.length === 0 && files.length > 0) {
      window.alert(`Please select valid .${CONVERSION_DIRECTIONS[state.direction].source} files`);
      return;
    }
    renderQueue(state, elements, actions);
  };

  for (const button of elements.directionButtons) {
    button.addEventListener('click', () => {
      const direction = button.dataset.direction;
      if (isConversionDirection(direction) && setDirection(state, direction)) {
        renderDirection(state, elements);
        renderQueue(state, elements, actions);
      }
    });
  }

  elements.fileInput.addEventListener('change', () => {
    queueFiles(Array.from(elements.fileInput.files ?? []));
    elements.fileInput.value = '';
  });

  const dropZone = requireElement('drop-zone', HTMLElement);
  dropZone.addEventListener('dragover', (event) => {
    event.preventDefault();
    dropZone.classList.add('drag-over');
  });
  dropZone.addEventListener('dragleave', () => {
    dropZone.classList.remove('drag-over');
  });
  dropZone.addEventListener('drop', (event) => {
    event.preventDefault();
    dropZone.classList.remove('drag-over');
    queueFiles(Array.from(event.dataTransfer?.files ?? []));
  });

  elements.convertButton.addEventListener('click', () => {
    void convertAll(state, api, {
      onChange: (current) => renderAll(current, elements, actions),
      onProgress: (item) => renderProgress(item, elements)
    });
  });

  elements.downloadAllButton.addEventListener('click', () => {
    if (state.converted.length > 0) {
      submitBulkDownload(api.bulkDownloadUrl(), state.converted.map((file) => file.fileId));
    }
  });

  renderAll(state, elements, actions);
}

document.addEventListener('DOMContentLoaded', start);
