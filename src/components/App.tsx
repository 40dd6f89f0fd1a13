import React, { useEffect } from "react";
import { Box, Text, useApp } from "ink";
import Spinner from "ink-spinner";
import { Header, PrintProgress, ConnectionStatus } from "./index.ts";
import { usePrint } from "../hooks/usePrint.ts";
import type { PrintCommandOptions } from "../cli/types.ts";

export interface AppProps {
  options: PrintCommandOptions;
  verbose: boolean;
}

export const App: React.FC<AppProps> = ({ options, verbose }) => {
  const { exit } = useApp();
  const { status, message, progress, logTail, jobSteps, connectionSteps } =
    usePrint(options, verbose);

  // Exit the app when done
  useEffect(() => {
    if (status === "success" || status === "error") {
      const timer = setTimeout(() => {
        exit();
        // Force exit since noble keeps handles open
        process.exit(status === "error" ? 1 : 0);
      }, 100);
      return () => clearTimeout(timer);
    }
  }, [status, exit]);

  return (
    <Box flexDirection="column" padding={1}>
      <Header />

      {status === "connecting" && (
        <Box flexDirection="column">
          <Box>
            <Text color="cyan">
              <Spinner type="dots" />
            </Text>
            <Text color="cyan" bold>
              {" "}
              {message}
            </Text>
          </Box>
          <ConnectionStatus steps={connectionSteps} />
        </Box>
      )}

      {status !== "connecting" && (
        <Box flexDirection="column">
          <PrintProgress status={status} message={message} progress={progress} />
          <ConnectionStatus steps={jobSteps} />
        </Box>
      )}

      {status === "success" && options.capture && (
        <Box marginTop={1}>
          <Text color="gray">Frame capture written to {options.capture}</Text>
        </Box>
      )}

      {status === "error" && (
        <Box marginTop={1}>
          <Text color="red">Please check your printer and try again.</Text>
        </Box>
      )}

      {verbose && logTail.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          {logTail.map((line, i) => (
            <Text key={i} color="gray">
              {line}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
};
