export type NotificationDto = {
  id: string;
  sequence: number;
  userId: string;
  message: string;
  metadata: string | null;
  read: boolean;
  createdAt: string;
};
