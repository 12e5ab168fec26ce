import { Box, Text } from "ink";
import BigText from "ink-big-text";
import type React from "react";

export const Header: React.FC = () => {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <BigText text="paperctl" font="tiny" />
      <Text color="white">
        Command-line client for M5Stack PaperS3 e-ink displays
      </Text>
    </Box>
  );
};
