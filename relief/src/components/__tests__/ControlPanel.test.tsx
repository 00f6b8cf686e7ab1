// @vitest-environment jsdom
import { describe, it, expect, vi, afterEach } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { ControlPanel } from '../ControlPanel';
import { DEFAULT_SETTINGS } from '../../settings';

afterEach(() => {
  cleanup();
});

describe('ControlPanel', () => {
  it('shows current values', () => {
    render(<ControlPanel settings={DEFAULT_SETTINGS} onChange={vi.fn()} />);

    expect(screen.getByText('20,000')).toBeInTheDocument();
    expect(screen.getByText('45°')).toBeInTheDocument();
    expect(screen.getByText('0.85')).toBeInTheDocument();
    expect(screen.getByLabelText(/Base Map/)).toHaveValue('dark');
  });

  it('reports slider changes', () => {
    const onChange = vi.fn();
    render(<ControlPanel settings={DEFAULT_SETTINGS} onChange={onChange} />);

    fireEvent.change(screen.getByLabelText(/Pitch/), { target: { value: '30' } });

    expect(onChange).toHaveBeenCalledWith({ ...DEFAULT_SETTINGS, pitch: 30 });
  });

  it('reports elevation scale changes', () => {
    const onChange = vi.fn();
    render(<ControlPanel settings={DEFAULT_SETTINGS} onChange={onChange} />);

    fireEvent.change(screen.getByLabelText(/Elevation Scale/), { target: { value: '35000' } });

    expect(onChange).toHaveBeenCalledWith({ ...DEFAULT_SETTINGS, elevationScale: 35000 });
  });

  it('switches base maps', () => {
    const onChange = vi.fn();
    render(<ControlPanel settings={DEFAULT_SETTINGS} onChange={onChange} />);

    fireEvent.change(screen.getByLabelText(/Base Map/), { target: { value: 'satellite' } });

    expect(onChange).toHaveBeenCalledWith({ ...DEFAULT_SETTINGS, baseMap: 'satellite' });
  });

  it('toggles wireframe', () => {
    const onChange = vi.fn();
    render(<ControlPanel settings={DEFAULT_SETTINGS} onChange={onChange} />);

    const button = screen.getByRole('button', { name: 'Wireframe On' });
    expect(button).toHaveAttribute('aria-pressed', 'true');

    fireEvent.click(button);

    expect(onChange).toHaveBeenCalledWith({ ...DEFAULT_SETTINGS, wireframe: false });
  });
});
