const SIZE_UNITS = ['Bytes', 'KB', 'MB', 'GB'];

export function formatFileSize(bytes: number): string {
  if (bytes <= 0) {
    return '0 Bytes';
  }

  const k = 1024;
  const index = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), SIZE_UNITS.length - 1);
  const value = Math.round((bytes / Math.pow(k, index)) * 100) / 100;

  return `${value} ${SIZE_UNITS[index]}`;
}

export function generateId(): string {
  return `file_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}
