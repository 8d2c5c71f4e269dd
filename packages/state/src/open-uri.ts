import { getLogger, type Logger } from "@logtape/logtape"
import {
  type AppAction,
  viewAlbum,
  viewArtist,
  viewPlaylist,
  viewUser,
} from "./app-action.js"

export const URI_SCHEME = "spotify"

const viewers: Record<string, (id: string) => AppAction> = {
  album: viewAlbum,
  artist: viewArtist,
  playlist: viewPlaylist,
  user: viewUser,
}

/**
 * Turns a `spotify:<kind>:<id>` URI into the navigation action that opens it.
 *
 * Some URI handlers hand us `spotify:///album:123` (an empty path left in
 * front of the kind), so a leading run of slashes on the kind is dropped.
 *
 * Anything malformed yields `undefined`; callers are expected to ignore it.
 *
 * @example
 * ```typescript
 * openUri("spotify:album:123") // navigation push to album-details 123
 * openUri("spotify:track:123") // undefined
 * ```
 */
export function openUri(
  uri: string,
  logger: Logger = getLogger(["riffline", "state"]),
): AppAction | undefined {
  const log = logger.getChild("open-uri")
  const parts = uri.split(":")

  if (parts.length !== 3) {
    log.debug("ignoring {uri}: expected 3 segments, got {count}", {
      uri,
      count: parts.length,
    })
    return undefined
  }

  const [scheme = "", rawKind = "", id = ""] = parts
  if (scheme !== URI_SCHEME) {
    log.debug("ignoring {uri}: unsupported scheme {scheme}", { uri, scheme })
    return undefined
  }

  const kind = rawKind.replace(/^\/+/, "")
  const view = Object.hasOwn(viewers, kind) ? viewers[kind] : undefined
  if (!view || id === "") {
    log.debug("ignoring {uri}: unknown kind {kind} or empty id", { uri, kind })
    return undefined
  }

  return view(id)
}
