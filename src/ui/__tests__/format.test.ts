import { describe, it, expect } from 'vitest';
import { formatCo2e, formatIntensity, formatChangePct } from '../format';

describe('format helpers', () => {
  it('groups thousands with two decimals', () => {
    expect(formatCo2e(6_282_888.5)).toBe('6,282,888.50');
    expect(formatCo2e(0)).toBe('0.00');
  });

  it('renders missing values as a dash, never as zero', () => {
    expect(formatCo2e(null)).toBe('—');
    expect(formatIntensity(null)).toBe('—');
    expect(formatChangePct(null)).toBe('—');
  });

  it('formats intensity to six decimals', () => {
    expect(formatIntensity(0.0123456789)).toBe('0.012346');
  });

  it('signs percentage changes', () => {
    expect(formatChangePct(-10)).toBe('-10.0%');
    expect(formatChangePct(4.25)).toBe('+4.3%');
    expect(formatChangePct(0)).toBe('0.0%');
  });
});
