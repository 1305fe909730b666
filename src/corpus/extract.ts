/**
 * Archive extraction for downloaded corpus releases
 */

import { mkdir } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { list, extract, ReadEntry } from 'tar';
import { UnsafeArchiveError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';

const getLog = () => createLogger('corpus:extract');

/** One archive member as listed, before anything is written */
export interface ArchiveMember {
  path: string;
  /** tar entry type, e.g. `File`, `Directory`, `SymbolicLink`, `Link` */
  type: string;
  /** Target of a symbolic or hard link */
  linkpath?: string;
}

function isInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel === '' || (!rel.startsWith(`..${sep}`) && rel !== '..' && !isAbsolute(rel));
}

/**
 * Check whether an archive member path stays inside a directory
 */
export function isContainedMember(destDir: string, member: string): boolean {
  if (isAbsolute(member)) {
    return false;
  }
  const root = resolve(destDir);
  return isInside(root, resolve(root, member));
}

/**
 * Check whether a link member points inside a directory.
 *
 * Symbolic link targets resolve from the link's own directory, hard link
 * targets from the archive root. Absolute targets are never contained.
 */
export function isContainedLink(destDir: string, member: ArchiveMember): boolean {
  if (member.linkpath === undefined) {
    return true;
  }
  if (isAbsolute(member.linkpath)) {
    return false;
  }
  const root = resolve(destDir);
  const base = member.type === 'SymbolicLink' ? dirname(resolve(root, member.path)) : root;
  return isInside(root, resolve(base, member.linkpath));
}

/**
 * List the members of a (possibly gzipped) tar archive in archive order
 */
export async function listArchiveMembers(archivePath: string): Promise<ArchiveMember[]> {
  const members: ArchiveMember[] = [];
  await list({
    file: archivePath,
    filter: (path, entry) => {
      const member: ArchiveMember = { path, type: 'File' };
      if (entry instanceof ReadEntry) {
        member.type = entry.type;
        if (entry.linkpath) {
          member.linkpath = entry.linkpath;
        }
      }
      members.push(member);
      return false;
    },
  });
  return members;
}

/**
 * List the member paths of a (possibly gzipped) tar archive in archive order
 */
export async function listArchive(archivePath: string): Promise<string[]> {
  return (await listArchiveMembers(archivePath)).map((member) => member.path);
}

/**
 * Unpack every member of an archive into a directory.
 *
 * The archive is listed first; if any member is absolute, resolves outside
 * `destDir`, or is a link whose target does, nothing is written.
 *
 * @returns Member paths in archive order
 * @throws {UnsafeArchiveError} On the first escaping member
 */
export async function extractArchive(archivePath: string, destDir: string): Promise<string[]> {
  const log = getLog();
  const members = await listArchiveMembers(archivePath);

  for (const member of members) {
    if (!isContainedMember(destDir, member.path) || !isContainedLink(destDir, member)) {
      log.error('Refusing to extract archive', {
        archive: archivePath,
        member: member.path,
        linkpath: member.linkpath,
      });
      throw new UnsafeArchiveError(member.path, member.linkpath);
    }
  }

  await mkdir(destDir, { recursive: true });
  await extract({ file: archivePath, cwd: destDir });

  log.info('Extracted archive', { archive: archivePath, dest: destDir, members: members.length });
  return members.map((member) => member.path);
}
