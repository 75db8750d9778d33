// Path: src/services/user-registry/qr.ts
// QR artifacts for connection strings

import fs from 'node:fs';
import QRCode from 'qrcode';
import { tempPathFor } from '../../utils/file.js';

export interface QrRenderer {
  /** Render text as a PNG image at filePath */
  toFile(filePath: string, text: string): Promise<void>;
  /** Render text as terminal art */
  toTerminal(text: string): Promise<string>;
}

export const qrcodeRenderer: QrRenderer = {
  async toFile(filePath, text) {
    const tempPath = tempPathFor(filePath);
    try {
      await QRCode.toFile(tempPath, text, { type: 'png', errorCorrectionLevel: 'M', margin: 2 });
      fs.renameSync(tempPath, filePath);
    } finally {
      fs.rmSync(tempPath, { force: true });
    }
  },
  toTerminal(text) {
    return QRCode.toString(text, { type: 'terminal' });
  },
};
