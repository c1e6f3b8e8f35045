import { describe, it, expect } from 'vitest';
import { UploadBuffer } from '../daemon/upload-buffer.js';

describe('UploadBuffer', () => {
  it('should start empty', () => {
    const buffer = new UploadBuffer();
    expect(buffer.size).toBe(0);
    expect(buffer.peek()).toBeUndefined();
    expect(buffer.shift()).toBeUndefined();
  });

  it('should keep paths in insertion order', () => {
    const buffer = new UploadBuffer();
    const paths = Array.from({ length: 25 }, (_, i) => `/photos/IMG_${String(i).padStart(4, '0')}.jpg`);

    for (const p of paths) {
      buffer.enqueue(p);
    }

    expect(buffer.size).toBe(25);
    expect(buffer.snapshot()).toEqual(paths);
    expect(buffer.peek()).toBe('/photos/IMG_0000.jpg');
  });

  it('should remove from the front', () => {
    const buffer = new UploadBuffer();
    buffer.enqueue('/a.jpg');
    buffer.enqueue('/b.jpg');

    expect(buffer.shift()).toBe('/a.jpg');
    expect(buffer.snapshot()).toEqual(['/b.jpg']);
  });

  it('should keep a path only once', () => {
    const buffer = new UploadBuffer();

    expect(buffer.enqueue('/a.jpg')).toBe(true);
    expect(buffer.enqueue('/b.jpg')).toBe(true);
    expect(buffer.enqueue('/a.jpg')).toBe(false);

    expect(buffer.snapshot()).toEqual(['/a.jpg', '/b.jpg']);
    expect(buffer.has('/a.jpg')).toBe(true);
  });

  it('should return a copy from snapshot', () => {
    const buffer = new UploadBuffer();
    buffer.enqueue('/a.jpg');

    const snapshot = buffer.snapshot();
    snapshot.push('/b.jpg');

    expect(buffer.size).toBe(1);
  });

  it('should clear', () => {
    const buffer = new UploadBuffer();
    buffer.enqueue('/a.jpg');
    buffer.clear();

    expect(buffer.size).toBe(0);
    expect(buffer.has('/a.jpg')).toBe(false);
  });
});
