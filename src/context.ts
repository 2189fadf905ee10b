import { listFiles, openFile, resolveInside } from './files.js'
import type { HttpContext } from './http/handlers.js'
import type { SessionManager } from './session/manager.js'

export interface ContextSettings {
  downloadDir: string
  fileExtensions: string[]
}

/** Binds the HTTP handlers to a session manager and the download directory. */
export function createHttpContext(manager: SessionManager, settings: ContextSettings): HttpContext {
  return {
    startSession: (sessionId, locator) => manager.start(sessionId, locator),
    getProgress: (sessionId) => manager.progress(sessionId),
    cancelSession: (sessionId) => manager.cancel(sessionId),
    listCompleted: () => manager.listCompleted(),
    openArtifact: (sessionId) => {
      const filePath = manager.artifactPath(sessionId)
      return filePath ? openFile(filePath) : null
    },
    listFiles: () => listFiles(settings.downloadDir, settings.fileExtensions),
    openDownload: (relativePath) => {
      const filePath = resolveInside(settings.downloadDir, relativePath)
      return filePath ? openFile(filePath) : null
    }
  }
}
