import { access } from 'fs/promises'
import * as path from 'path'

export const CROPPED_SUFFIX = '_cropped'

export type PathExists = (filePath: string) => Promise<boolean>

export const pathExists: PathExists = async (filePath) => {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * `<stem>_cropped<ext>` in `outputDir`, then `<stem>_cropped_1<ext>`, `_2`, ... until the name
 * is neither on disk nor already handed out in this batch. The chosen path is added to
 * `reserved`.
 */
export async function resolveOutputPath(
  sourcePath: string,
  outputDir: string,
  reserved: Set<string>,
  exists: PathExists = pathExists
): Promise<string> {
  const { name, ext } = path.parse(sourcePath)

  for (let n = 0; ; n++) {
    const suffix = n === 0 ? CROPPED_SUFFIX : `${CROPPED_SUFFIX}_${n}`
    const candidate = path.join(outputDir, `${name}${suffix}${ext}`)
    if (reserved.has(candidate)) continue
    if (await exists(candidate)) continue
    reserved.add(candidate)
    return candidate
  }
}
