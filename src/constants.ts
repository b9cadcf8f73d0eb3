/**
 * Shared constants used across the application
 */

/**
 * Config file probed in the base directory when no config is given
 */
export const DEFAULT_CONFIG_FILE = "sgrep.yml";

/**
 * Config folder probed when the default config file is missing
 */
export const DEFAULT_CONFIG_FOLDER = ".sgrep";

/**
 * Hidden directories whose name contains this marker are still scanned
 */
export const DEFAULT_SGREP_CONFIG_NAME = "sgrep";

export const YML_EXTENSIONS: readonly string[] = [".yml", ".yaml"];

export const RULES_KEY = "rules";
export const ID_KEY = "id";

/**
 * Config id used for a single plain-text document fetched from a URL
 */
export const REMOTE_CONFIG_ID = "remote-url";

export const USER_AGENT = "sgrep-config";

/**
 * Mount point of the scanned repository inside the sgrep container
 */
export const REPO_HOME_DOCKER = "/home/repo/";

export const TEMPLATE_YAML_URL =
	"https://raw.githubusercontent.com/returntocorp/sgrep-rules/develop/template.yaml";

export const TEMPLATE_FETCH_TIMEOUT_MS = 10_000;

/**
 * Written by --generate-config when the template cannot be downloaded
 */
export const FALLBACK_TEMPLATE_YAML = `rules:
  - id: eqeq-is-bad
    pattern: $X == $X
    message: "$X == $X is a useless equality check"
    languages: [python]
    severity: ERROR
`;
