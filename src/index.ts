#!/usr/bin/env tsx
import { main } from './cli/command'

void main()
