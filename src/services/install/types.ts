/**
 * Types for JDK installation.
 */

/**
 * Where the archive comes from.
 * - file: a local archive owned by the caller, never deleted
 * - download-latest: resolved from the release channel and downloaded to a temp file
 */
export type InstallSource =
  | { readonly kind: "file"; readonly path: string }
  | { readonly kind: "download-latest" };

/**
 * Validated, immutable installation request.
 */
export interface InstallRequest {
  readonly source: InstallSource;
  /** Directory the JDK is installed into */
  readonly destination: string;
  /** Update the machine-wide home variable and PATH after extraction */
  readonly updatePath: boolean;
}

/**
 * A downloadable file attached to a release.
 */
export interface ReleaseAsset {
  readonly name: string;
  readonly downloadUrl: string;
}

/**
 * Description of the single release channel the installer knows about.
 */
export interface JdkDistribution {
  /** GitHub repository in owner/name form */
  readonly repository: string;
  /** Glob matched case-insensitively against asset names */
  readonly assetPattern: string;
  /** Install location when none is given */
  readonly defaultDestination: string;
  /** Machine-scope variable pointing at the install root */
  readonly homeVariable: string;
  /** Executable path relative to the install root, `/`-separated */
  readonly executable: string;
  /**
   * Folder relative to the install root to add to PATH instead of the root.
   * Unset adds the install root itself.
   */
  readonly pathEntry?: string;
  /** Leading path segments removed from every archive entry */
  readonly stripLevels: number;
}

/**
 * Progress information for archive downloads.
 */
export interface DownloadProgress {
  /** Number of bytes downloaded so far */
  readonly bytesDownloaded: number;
  /** Total bytes to download, null if Content-Length not provided */
  readonly totalBytes: number | null;
}

/**
 * Callback for download progress updates.
 */
export type DownloadProgressCallback = (progress: DownloadProgress) => void;

/**
 * Outcome of the environment update step.
 */
export interface EnvironmentUpdateResult {
  /** True if the home variable was written */
  readonly homeUpdated: boolean;
  /** True if PATH was written */
  readonly pathUpdated: boolean;
}

/**
 * Outcome of a successful installation.
 */
export interface InstallResult {
  readonly destination: string;
  /** Version lines reported by the installed executable */
  readonly version: string;
  readonly source: InstallSource["kind"];
  /** Set when the archive was downloaded */
  readonly downloadUrl?: string;
  /** Set when the environment was updated */
  readonly environment?: EnvironmentUpdateResult;
}
