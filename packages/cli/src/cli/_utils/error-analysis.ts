// pattern: Functional Core

import {
  CommandExecutionError,
  ConfigurationError,
  ConnectionError,
  EdgeProbeError,
  getErrorMessage,
  KeyFormatError,
  KeyGenerationError,
  KeyInstallError,
  TransferError,
  ValidationError,
} from "../../utils/errors.js";

export const ERROR_CATEGORIES = [
  "connection",
  "credentials",
  "execution",
  "transfer",
  "filesystem",
  "network",
  "validation",
  "configuration",
  "unknown",
] as const;

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category: (typeof ERROR_CATEGORIES)[number];
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
}

function toCategory(category: string): AnalyzedError["category"] {
  return ERROR_CATEGORIES.find(known => known === category) ?? "unknown";
}

/**
 * Analyzes an error and provides structured information with user-friendly messages
 *
 * Typed edgeprobe errors keep their own message; anything else is matched
 * against the error strings Node and ssh2 produce.
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof EdgeProbeError) {
    const errorMessage = error.message;

    if (error instanceof ConnectionError) {
      // The message already carries remediation steps
      return {
        category: "connection",
        userMessage: errorMessage,
        technicalMessage: error.attempts.join("; ") || errorMessage,
        suggestions: [],
      };
    }

    if (error instanceof KeyFormatError) {
      return {
        category: "credentials",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: [
          "Use an RSA, Ed25519 or ECDSA private key in OpenSSH or PEM format",
          "Set key_passphrase in the inventory if the key is encrypted",
          "Check ssh_key_path points at the private key, not the .pub file",
        ],
      };
    }

    if (error instanceof KeyGenerationError) {
      return {
        category: "credentials",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: [
          `Check that you can write to the directory of ${error.keyPath}`,
          "Ensure the .ssh folder exists in your home directory",
        ],
      };
    }

    if (error instanceof KeyInstallError) {
      return {
        category: "credentials",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions: [
          "Check the login user can write to ~/.ssh on the device",
          "Verify the device has free disk space",
          `Check ${error.publicKeyPath} contains a single public key line`,
        ],
      };
    }

    if (error instanceof CommandExecutionError) {
      return {
        category: "execution",
        userMessage: errorMessage,
        technicalMessage: `${errorMessage} (command: ${error.command})`,
        suggestions: [
          "The connection to the device dropped; check its network link",
          "Raise EDGEPROBE_COMMAND_TIMEOUT_MS if the device is slow to respond",
        ],
      };
    }

    if (error instanceof TransferError) {
      const suggestions =
        error.operation === "upload"
          ? [
              "Check the local file exists and is readable",
              "Verify there is enough disk space on the device",
              "Verify you have write permissions for the remote path",
            ]
          : [
              "Check the remote file exists and is readable",
              "Ensure the local directory is writable",
            ];
      return {
        category: "transfer",
        userMessage: errorMessage,
        technicalMessage: `${error.operation} ${error.localPath} <-> ${error.remotePath}: ${errorMessage}`,
        suggestions,
      };
    }

    if (error instanceof ValidationError) {
      const suggestions = [
        "Check your inventory file syntax",
        "Verify every host has a connection with hostname and username",
      ];

      if (error.validationErrors && error.validationErrors.length > 0) {
        suggestions.push(...error.validationErrors.map(e => `- ${e}`));
      }

      return {
        category: "validation",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions,
      };
    }

    if (error instanceof ConfigurationError) {
      let suggestions = [
        "Check your inventory file for errors",
        "Run with --log-level debug for more detailed information",
      ];

      const errorLower = errorMessage.toLowerCase();
      if (errorLower.includes("inventory not found")) {
        suggestions = [
          "Run this command from the directory containing inventory.yaml",
          "Point to the file with --inventory or EDGEPROBE_INVENTORY",
        ];
      } else if (errorLower.includes("unknown host")) {
        suggestions = ["List the configured hosts with: edgeprobe hosts"];
      } else if (errorLower.includes("environment variable")) {
        suggestions = ["Export the variable before running edgeprobe"];
      }

      return {
        category: "configuration",
        userMessage: errorMessage,
        technicalMessage: errorMessage,
        suggestions,
      };
    }

    // Generic EdgeProbeError handling - use the actual error message
    return {
      category: toCategory(error.category),
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions: [
        "Check the error message for details",
        "Run with --log-level debug for more information",
      ],
    };
  }

  // Fall back to string-based analysis for errors from Node and ssh2
  const errorMessage = getErrorMessage(error);
  const errorString = errorMessage.toLowerCase();

  if (errorString.includes("all configured authentication methods failed")) {
    return {
      category: "credentials",
      userMessage: "The device rejected the login",
      technicalMessage: errorMessage,
      suggestions: [
        "Check username and password in the inventory file",
        "Run edgeprobe bootstrap to install an SSH key",
      ],
    };
  }

  if (errorString.includes("cannot parse privatekey")) {
    return {
      category: "credentials",
      userMessage: "The SSH private key could not be read",
      technicalMessage: errorMessage,
      suggestions: [
        "Set key_passphrase in the inventory if the key is encrypted",
        "Check ssh_key_path points at a private key",
      ],
    };
  }

  if (errorString.includes("eacces") || errorString.includes("permission denied")) {
    return {
      category: "filesystem",
      userMessage: "Permission denied accessing files or directories",
      technicalMessage: errorMessage,
      suggestions: [
        "Check that you have write permissions to the target directories",
        "Verify the file or directory ownership is correct",
      ],
    };
  }

  if (errorString.includes("enoent")) {
    return {
      category: "filesystem",
      userMessage: "Required file or directory not found",
      technicalMessage: errorMessage,
      suggestions: ["Verify the file or directory path exists"],
    };
  }

  if (errorString.includes("econnrefused")) {
    return {
      category: "network",
      userMessage: "Connection refused by the device",
      technicalMessage: errorMessage,
      suggestions: [
        "Ensure SSH is enabled on the device",
        "Check the port number in the inventory",
        "Ensure no firewall is blocking the connection",
      ],
    };
  }

  if (
    errorString.includes("etimedout") ||
    errorString.includes("timed out while waiting for handshake")
  ) {
    return {
      category: "network",
      userMessage: "Connection timed out",
      technicalMessage: errorMessage,
      suggestions: [
        "Check the device is powered on",
        "Verify your VPN connection (tailscale status)",
        "Raise EDGEPROBE_CONNECT_TIMEOUT_MS for slow links",
      ],
    };
  }

  if (
    errorString.includes("ehostunreach") ||
    errorString.includes("enetunreach") ||
    errorString.includes("getaddrinfo")
  ) {
    return {
      category: "network",
      userMessage: "Unable to reach the specified host",
      technicalMessage: errorMessage,
      suggestions: [
        "Check the hostname in the inventory is correct",
        "Verify your DNS settings",
        "Verify your VPN connection (tailscale status)",
      ],
    };
  }

  // Unknown errors
  return {
    category: "unknown",
    userMessage: "An unexpected error occurred",
    technicalMessage: errorMessage,
    suggestions: [
      "Try the operation again",
      "Check the command syntax and arguments",
      "Run with --log-level debug for more detailed information",
    ],
  };
}
