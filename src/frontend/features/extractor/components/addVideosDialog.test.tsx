// @vitest-environment jsdom
import {
  cleanup,
  fireEvent,
  render,
  screen,
  waitFor,
} from '@testing-library/react';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { useExtractorStore } from '../stores';
import { AddVideosDialog } from './addVideosDialog';

const api = vi.hoisted(() => ({
  getConfig: vi.fn(),
  listDirectory: vi.fn(),
  extractClip: vi.fn(),
  extractAll: vi.fn(),
  playFile: vi.fn(),
}));

const toast = vi.hoisted(() => ({
  success: vi.fn(),
  error: vi.fn(),
  info: vi.fn(),
}));

vi.mock('@/frontend/lib/extractorApi', () => ({ extractorApi: api }));
vi.mock('sonner', () => ({ toast }));

const initialState = useExtractorStore.getState();
const store = () => useExtractorStore.getState();

const mediaListing = {
  success: true,
  directory: '/media',
  parent: '/',
  entries: [
    { name: 'trips', path: '/media/trips', kind: 'directory' },
    { name: 'a.mp4', path: '/media/a.mp4', kind: 'video' },
    { name: 'b.mkv', path: '/media/b.mkv', kind: 'video' },
  ],
};

describe('AddVideosDialog', () => {
  beforeEach(() => {
    useExtractorStore.setState(initialState, true);
    api.listDirectory.mockResolvedValue(mediaListing);
  });

  afterEach(() => {
    cleanup();
    vi.clearAllMocks();
  });

  it('should add the checked videos and close', async () => {
    const onClose = vi.fn();
    render(<AddVideosDialog isOpen onClose={onClose} />);

    fireEvent.click(await screen.findByRole('checkbox', { name: 'Select a.mp4' }));
    fireEvent.click(screen.getByRole('checkbox', { name: 'Select b.mkv' }));
    fireEvent.click(screen.getByRole('button', { name: 'Add 2 Videos' }));

    expect(store().entryOrder).toEqual(['/media/a.mp4', '/media/b.mkv']);
    expect(toast.success).toHaveBeenCalledWith('Added 2 videos');
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it('should keep the add button disabled until something is checked', async () => {
    render(<AddVideosDialog isOpen onClose={vi.fn()} />);

    const checkbox = await screen.findByRole('checkbox', { name: 'Select a.mp4' });
    expect(screen.getByRole('button', { name: 'Add Videos' })).toHaveProperty(
      'disabled',
      true,
    );

    fireEvent.click(checkbox);
    expect(screen.getByRole('button', { name: 'Add 1 Video' })).toHaveProperty(
      'disabled',
      false,
    );

    fireEvent.click(checkbox);
    expect(screen.getByRole('button', { name: 'Add Videos' })).toHaveProperty(
      'disabled',
      true,
    );
  });

  it('should report videos that are already listed', async () => {
    store().addFile('/media/a.mp4');
    const onClose = vi.fn();
    render(<AddVideosDialog isOpen onClose={onClose} />);

    fireEvent.click(await screen.findByRole('checkbox', { name: 'Select a.mp4' }));
    fireEvent.click(screen.getByRole('button', { name: 'Add 1 Video' }));

    expect(store().entryOrder).toEqual(['/media/a.mp4']);
    expect(toast.info).toHaveBeenCalledWith('Those videos are already in the list');
    expect(toast.success).not.toHaveBeenCalled();
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it('should open a folder when it is clicked', async () => {
    render(<AddVideosDialog isOpen onClose={vi.fn()} />);

    fireEvent.click(await screen.findByRole('button', { name: 'trips' }));

    await waitFor(() =>
      expect(api.listDirectory).toHaveBeenLastCalledWith('/media/trips'),
    );
  });

  it('should show the backend error when a folder cannot be listed', async () => {
    api.listDirectory.mockResolvedValue({
      success: false,
      error: 'Cannot read directory: /media',
    });
    render(<AddVideosDialog isOpen onClose={vi.fn()} />);

    expect(
      await screen.findByText('Cannot read directory: /media'),
    ).toBeTruthy();
  });

  it('should close on Escape without adding anything', async () => {
    const onClose = vi.fn();
    render(<AddVideosDialog isOpen onClose={onClose} />);

    fireEvent.click(await screen.findByRole('checkbox', { name: 'Select a.mp4' }));
    fireEvent.keyDown(document.body, { key: 'Escape' });

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(store().entryOrder).toEqual([]);
  });

  it('should close from the header button', async () => {
    const onClose = vi.fn();
    render(<AddVideosDialog isOpen onClose={onClose} />);

    await screen.findByRole('checkbox', { name: 'Select a.mp4' });
    fireEvent.click(screen.getByRole('button', { name: 'Close' }));

    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it('should render nothing while closed', () => {
    render(<AddVideosDialog isOpen={false} onClose={vi.fn()} />);

    expect(screen.queryByRole('dialog')).toBeNull();
    expect(api.listDirectory).not.toHaveBeenCalled();
  });
});
