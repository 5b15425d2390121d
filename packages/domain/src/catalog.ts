import { type NewActivity } from './activity';

export const DEFAULT_ACTIVITIES: readonly NewActivity[] = [
  {
    name: 'Chess Club',
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    maxParticipants: 12,
  },
  {
    name: 'Programming Class',
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    maxParticipants: 20,
  },
  {
    name: 'Gym Class',
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    maxParticipants: 30,
  },
  {
    name: 'Soccer Team',
    description: 'Join the school soccer team and compete in matches',
    schedule: 'Tuesdays and Thursdays, 4:00 PM - 5:30 PM',
    maxParticipants: 22,
  },
  {
    name: 'Basketball Team',
    description: 'Practice and play basketball with the school team',
    schedule: 'Wednesdays and Fridays, 3:30 PM - 5:00 PM',
    maxParticipants: 15,
  },
  {
    name: 'Art Club',
    description: 'Explore your creativity through painting and drawing',
    schedule: 'Thursdays, 3:30 PM - 5:00 PM',
    maxParticipants: 15,
  },
  {
    name: 'Drama Club',
    description: 'Act, direct, and produce plays and performances',
    schedule: 'Mondays and Wednesdays, 4:00 PM - 5:30 PM',
    maxParticipants: 20,
  },
  {
    name: 'Math Club',
    description: 'Solve challenging problems and participate in math competitions',
    schedule: 'Tuesdays, 3:30 PM - 4:30 PM',
    maxParticipants: 10,
  },
  {
    name: 'Debate Team',
    description: 'Develop public speaking and argumentation skills',
    schedule: 'Fridays, 4:00 PM - 5:30 PM',
    maxParticipants: 12,
  },
];
