import { Button } from '@/frontend/components/ui/button';
import { Checkbox } from '@/frontend/components/ui/checkbox';
import {
  Dialog,
  DialogContent,
  DialogDescription,
  DialogFooter,
  DialogHeader,
  DialogTitle,
} from '@/frontend/components/ui/dialog';
import { extractorApi } from '@/frontend/lib/extractorApi';
import type { DirectoryListing } from '@/shared/types/extractor.types';
import { ArrowUp, FileVideo, Folder } from 'lucide-react';
import React, { useCallback, useEffect, useState } from 'react';
import { toast } from 'sonner';
import { useExtractorStore } from '../stores';

interface AddVideosDialogProps {
  isOpen: boolean;
  onClose: () => void;
}

const addLabel = (count: number) =>
  count === 0 ? 'Add Videos' : `Add ${count} Video${count === 1 ? '' : 's'}`;

/**
 * In-app file picker: browses the backend's filesystem and adds the checked
 * videos to the session.
 */
export const AddVideosDialog: React.FC<AddVideosDialogProps> = ({
  isOpen,
  onClose,
}) => {
  const addFiles = useExtractorStore((state) => state.addFiles);
  const [listing, setListing] = useState<DirectoryListing | null>(null);
  const [selected, setSelected] = useState<string[]>([]);
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const browse = useCallback(async (directory?: string) => {
    setIsLoading(true);
    const response = await extractorApi.listDirectory(directory);
    setIsLoading(false);

    if (!response.success) {
      setError(response.error);
      return;
    }

    setError(null);
    setListing({
      directory: response.directory,
      parent: response.parent,
      entries: response.entries,
    });
  }, []);

  const browseOrLog = useCallback(
    (directory?: string) => {
      browse(directory).catch((err: unknown) => {
        console.error('❌ Failed to browse media directory:', err);
      });
    },
    [browse],
  );

  useEffect(() => {
    if (!isOpen) return;
    setSelected([]);
    browseOrLog();
  }, [isOpen, browseOrLog]);

  const setChecked = (path: string, checked: boolean) =>
    setSelected((current) =>
      checked
        ? [...current.filter((item) => item !== path), path]
        : current.filter((item) => item !== path),
    );

  const handleAdd = () => {
    const added = addFiles(selected);
    if (added > 0) {
      toast.success(`Added ${added} video${added === 1 ? '' : 's'}`);
    } else {
      toast.info('Those videos are already in the list');
    }
    onClose();
  };

  const parent = listing?.parent;

  return (
    <Dialog
      open={isOpen}
      onOpenChange={(open) => {
        if (!open) onClose();
      }}
    >
      <DialogContent className="max-w-xl">
        <DialogHeader>
          <DialogTitle>Add Videos</DialogTitle>
          <DialogDescription>
            Check the videos to add, or open a folder to look inside it.
          </DialogDescription>
        </DialogHeader>

        <div className="flex items-center gap-2 rounded-md bg-muted px-2 py-1 text-sm">
          <Button
            variant="ghost"
            size="icon"
            aria-label="Parent directory"
            disabled={!parent || isLoading}
            onClick={() => parent && browseOrLog(parent)}
          >
            <ArrowUp />
          </Button>
          <span className="truncate" title={listing?.directory}>
            {listing?.directory ?? 'Loading…'}
          </span>
        </div>

        {error && <p className="text-sm text-destructive">{error}</p>}

        <ul className="max-h-80 overflow-y-auto rounded-md border border-border">
          {listing?.entries.map((entry) =>
            entry.kind === 'directory' ? (
              <li key={entry.path}>
                <button
                  type="button"
                  className="flex w-full items-center gap-2 px-3 py-2 text-left text-sm hover:bg-muted disabled:opacity-50"
                  disabled={isLoading}
                  onClick={() => browseOrLog(entry.path)}
                >
                  <Folder className="size-4 text-muted-foreground" />
                  {entry.name}
                </button>
              </li>
            ) : (
              <li
                key={entry.path}
                className="flex items-center gap-2 px-3 py-2 text-sm hover:bg-muted"
              >
                <Checkbox
                  aria-label={`Select ${entry.name}`}
                  checked={selected.includes(entry.path)}
                  onCheckedChange={(checked) =>
                    setChecked(entry.path, checked === true)
                  }
                />
                <FileVideo className="size-4 text-muted-foreground" />
                <span className="truncate">{entry.name}</span>
              </li>
            ),
          )}
          {listing && listing.entries.length === 0 && (
            <li className="px-3 py-6 text-center text-sm text-muted-foreground">
              No folders or videos here
            </li>
          )}
        </ul>

        <DialogFooter>
          <Button variant="outline" onClick={onClose}>
            Cancel
          </Button>
          <Button disabled={selected.length === 0} onClick={handleAdd}>
            {addLabel(selected.length)}
          </Button>
        </DialogFooter>
      </DialogContent>
    </Dialog>
  );
};
