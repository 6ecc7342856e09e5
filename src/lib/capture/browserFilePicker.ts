import type { FilePicker } from './imageSource';

export type BrowserFilePickerOptions = {
  captureHint?: 'user' | 'environment';
  /** How long to wait for `change` after the window regains focus before treating the pick as dismissed. */
  focusGraceMs?: number;
};

/**
 * Picks an image through a transient, hidden `<input type="file">`. On phones
 * the `capture` hint opens the camera app directly.
 *
 * Dismissal resolves `null`: through the input's `cancel` event where the
 * browser fires it, otherwise once the window regains focus and no file
 * arrived within `focusGraceMs`.
 */
export class BrowserFilePicker implements FilePicker {
  private readonly captureHint: 'user' | 'environment';
  private readonly focusGraceMs: number;

  constructor(options: BrowserFilePickerOptions = {}) {
    this.captureHint = options.captureHint ?? 'user';
    this.focusGraceMs = options.focusGraceMs ?? 500;
  }

  public pickImage(): Promise<Uint8Array | null> {
    return new Promise<Uint8Array | null>((resolve, reject) => {
      const input = document.createElement('input');
      input.type = 'file';
      input.accept = 'image/*';
      input.setAttribute('capture', this.captureHint);
      input.style.display = 'none';

      let settled = false;
      let fileChosen = false;
      let focusTimer: number | null = null;

      const cleanup = () => {
        input.removeEventListener('change', onChange);
        input.removeEventListener('cancel', onCancel);
        window.removeEventListener('focus', onFocus);
        if (focusTimer !== null) window.clearTimeout(focusTimer);
        input.remove();
      };

      const settle = (finish: () => void) => {
        if (settled) return;
        settled = true;
        cleanup();
        finish();
      };

      const onCancel = () => settle(() => resolve(null));

      const onChange = () => {
        const file = input.files?.[0];
        if (!file) {
          onCancel();
          return;
        }
        fileChosen = true;
        file.arrayBuffer().then(
          (buf) => settle(() => resolve(new Uint8Array(buf))),
          (err: unknown) => settle(() => reject(err))
        );
      };

      // Some browsers fire `change` only after focus returns; give it a moment.
      const onFocus = () => {
        if (focusTimer !== null) window.clearTimeout(focusTimer);
        focusTimer = window.setTimeout(() => {
          if (!fileChosen) onCancel();
        }, this.focusGraceMs);
      };

      input.addEventListener('change', onChange);
      input.addEventListener('cancel', onCancel);
      document.body.appendChild(input);
      input.click();
      window.addEventListener('focus', onFocus);
    });
  }
}
