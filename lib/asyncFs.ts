import * as fs from 'fs';
import * as util from 'util';

export interface AsyncFsSubset {
  stat: (path: string) => Promise<fs.Stats>;
  lstat: (path: string) => Promise<fs.Stats>;
  readdir: (path: string) => Promise<string[]>;
  access: (path: string, mode?: number) => Promise<void>;
}

export const fsAsync: AsyncFsSubset = {
  stat: util.promisify(fs.stat),
  lstat: util.promisify(fs.lstat),
  readdir: util.promisify(fs.readdir),
  access: util.promisify(fs.access)
};
