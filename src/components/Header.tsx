import { Box, Text } from "ink";
import BigText from "ink-big-text";
import type React from "react";

export const Header: React.FC = () => {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <BigText text="LX Print" font="tiny" />
      <Text color="white">CLI tool for printing labels on LX-D01 thermal printers</Text>
    </Box>
  );
};
