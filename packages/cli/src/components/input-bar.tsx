import React, { useState } from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';

interface InputBarProps {
  onSubmit: (value: string) => void;
}

export function InputBar({ onSubmit }: InputBarProps) {
  const [value, setValue] = useState('');

  const handleSubmit = (val: string) => {
    onSubmit(val);
    setValue('');
  };

  return (
    <Box borderStyle="single" borderColor="gray" paddingX={1}>
      <Text color="cyan">{'> '}</Text>
      <TextInput value={value} onChange={setValue} onSubmit={handleSubmit} />
    </Box>
  );
}
