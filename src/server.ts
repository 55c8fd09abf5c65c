import { config } from 'dotenv';
import { createApp } from './app';
import { getServerPort } from './config/replenishmentDefaults';

config();

const PORT = getServerPort();

const app = createApp();

app.listen(PORT, () => {
  console.log(`Replenishment planner API listening on port ${PORT}`);
});
