import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { QUALITY_CODES, QUALITY_TABLE } from '../services/qqmusic/constants.js';

export const qualitiesResource = {
  uri: 'qqmusic://qualities',
  name: 'qualities',
  title: 'Audio Qualities',
  description: 'Quality codes accepted by get_song_url, with format and whether a VIP cookie is needed',
  mimeType: 'application/json',

  handler: async (): Promise<ReadResourceResult> => {
    const qualities = QUALITY_CODES.map((code) => {
      const { ext, label, requiresCredential } = QUALITY_TABLE[code];
      return { code, ext, label, requiresCredential };
    });
    return {
      contents: [
        {
          uri: 'qqmusic://qualities',
          mimeType: 'application/json',
          text: JSON.stringify(qualities, null, 2),
        },
      ],
    };
  },
} as const;
