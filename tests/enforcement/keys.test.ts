/**
 * Unit tests for redis/keys.ts
 */

import { describe, it, expect } from 'vitest';
import { quotaKey, dayOfQuotaKey, keys } from '../../lib/redis/keys.js';
import { QUOTA_KIND } from '../../lib/db/schema.js';

describe('redis/keys', () => {
  describe('quotaKey', () => {
    it('should generate correct key pattern', () => {
      expect(quotaKey(3, QUOTA_KIND.VIDEO_TOKENS, '20250124')).toBe('app:quota:3:video_tokens:20250124');
      expect(quotaKey(12, QUOTA_KIND.IMAGE_COUNT, '20250125')).toBe('app:quota:12:image_count:20250125');
    });

    it('should be exposed on the keys map', () => {
      expect(keys.quota(1, QUOTA_KIND.IMAGE_COUNT, '20250124')).toBe('app:quota:1:image_count:20250124');
    });
  });

  describe('dayOfQuotaKey', () => {
    it('should return the trailing day key', () => {
      expect(dayOfQuotaKey('app:quota:3:video_tokens:20250124')).toBe('20250124');
    });
  });
});
