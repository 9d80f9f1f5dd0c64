import { describe, it, expect } from 'vitest';
import { truncateText, formatDateTime } from '../utils.js';

describe('truncateText', () => {
  it('上限以下ならそのまま', () => {
    expect(truncateText('hello', 5)).toEqual({ text: 'hello', truncated: false });
    expect(truncateText('', 0)).toEqual({ text: '', truncated: false });
  });

  it('上限を超えたら先頭max文字に切る', () => {
    expect(truncateText('hello world', 5)).toEqual({ text: 'hello', truncated: true });
  });

  it('サロゲートペアを1文字として数える', () => {
    const text = '😀😀😀';
    expect(truncateText(text, 2)).toEqual({ text: '😀😀', truncated: true });
    expect(truncateText(text, 3)).toEqual({ text, truncated: false });
  });

  it('max=0は空文字', () => {
    expect(truncateText('abc', 0)).toEqual({ text: '', truncated: true });
  });
});

describe('formatDateTime', () => {
  it('ローカル時刻でゼロ埋めする', () => {
    expect(formatDateTime(new Date(2025, 0, 2, 3, 4, 5))).toBe('2025-01-02 03:04:05');
  });
});
