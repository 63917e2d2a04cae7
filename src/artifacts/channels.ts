/**
 * Publication channels.
 *
 * The generic channel keeps one artifact per (qualifier, name). The site
 * channel keeps a single current version per name and replaces it on every
 * publish. A staged artifact may be a single file or a directory tree.
 */

import { join } from 'path';
import { Publication } from '../domain/artifact';
import { copyAtomically } from './fs-utils';
import { qualifiedName } from './naming';

export interface ArtifactChannel {
  publish(qualifier: string | undefined, name: string, staged: string): Promise<Publication>;
}

export interface SiteChannel {
  publish(name: string, staged: string): Promise<Publication>;
}

/** Generic channel backed by `<root>/<qualifier>-<name>/<name>`. */
export class DirectoryArtifactChannel implements ArtifactChannel {
  constructor(private readonly root: string) {}

  async publish(qualifier: string | undefined, name: string, staged: string): Promise<Publication> {
    const location = join(this.root, qualifiedName(qualifier, name), name);
    await copyAtomically(staged, location);
    return { channel: 'artifact', qualifier, name, location };
  }
}

/** Site channel backed by `<root>/<name>`. */
export class DirectorySiteChannel implements SiteChannel {
  constructor(private readonly root: string) {}

  async publish(name: string, staged: string): Promise<Publication> {
    const location = join(this.root, name);
    await copyAtomically(staged, location);
    return { channel: 'site', name, location };
  }
}
