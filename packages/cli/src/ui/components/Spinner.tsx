import React, { useState, useEffect } from 'react';
import { Text } from 'ink';
import { formatElapsed } from '../format.js';

const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const FRAME_MS = 80;

/** Spinner with the time since it mounted; remount it to restart the clock. */
export function Spinner({ text }: { text?: string }) {
  const [startedAt] = useState(() => Date.now());
  const [now, setNow] = useState(startedAt);

  useEffect(() => {
    const timer = setInterval(() => setNow(Date.now()), FRAME_MS);
    return () => clearInterval(timer);
  }, []);

  const frame = Math.floor((now - startedAt) / FRAME_MS) % frames.length;

  return (
    <Text>
      <Text color="cyan">{frames[frame]}</Text>
      {text ? <Text> {text}</Text> : null}
      <Text color="gray"> {formatElapsed(now - startedAt)}</Text>
    </Text>
  );
}
